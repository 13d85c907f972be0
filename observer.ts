/**
 * Copyright 2025 Mike Odnis
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { Logger } from "./logger";
import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

const logger = Logger.getLogger("observer");

export interface Observer<T> {
	update(value: T): void;
}

/**
 * Holds a piece of state and the observers interested in it.
 *
 * Observers are held by reference and not owned. Attaching the same
 * observer twice means it is notified twice per change.
 */
export class Subject<T> {
	private observers: Observer<T>[] = [];
	private state: T;

	constructor(initialState: T) {
		this.state = initialState;
	}

	get observerCount(): number {
		return this.observers.length;
	}

	attach(observer: Observer<T>): void {
		this.observers.push(observer);
		logger.debug("Observer attached", { count: this.observers.length });
	}

	/** Removes the first matching reference; no-op when it is not attached. */
	detach(observer: Observer<T>): void {
		const index = this.observers.indexOf(observer);
		if (index !== -1) {
			this.observers.splice(index, 1);
			logger.debug("Observer detached", { count: this.observers.length });
		}
	}

	getState(): T {
		return this.state;
	}

	setState(value: T): void {
		this.state = value;
		this.notify();
	}

	// The list is copied first: attach/detach from inside update() applies to the next pass.
	protected notify(): void {
		const recipients = [...this.observers];
		for (const observer of recipients) {
			observer.update(this.state);
		}
	}
}

export class NewsAgency extends Subject<string> {
	constructor() {
		super("");
	}

	setNews(news: string): void {
		this.setState(news);
	}

	getNews(): string {
		return this.getState();
	}
}

export class Subscriber implements Observer<string> {
	constructor(
		private readonly name: string,
		private readonly out: Narrate,
	) {}

	update(message: string): void {
		this.out(`${this.name} received update: ${message}`);
	}
}

export function runObserverDemo(out: Narrate = consoleNarrator): void {
	const agency = new NewsAgency();
	const alice = new Subscriber("Alice", out);
	const bob = new Subscriber("Bob", out);

	agency.attach(alice);
	agency.attach(bob);
	agency.setNews("Breaking News: Observer Pattern Implemented!");

	agency.detach(bob);
	agency.setNews("Update: Observer Pattern is Awesome!");
}

export const observerDemo: DemoDefinition = {
	name: "observer",
	title: "Observer",
	category: "behavioral",
	summary:
		"Sets up a one-to-many dependency so that when a subject changes, every attached observer " +
		"hears about it. A news agency broadcasts to whoever is subscribed right now; subscribers " +
		"come and go without the agency caring who they are.",
	participants: [
		"Observer: update(value)",
		"Subject: attach, detach and setState with in-order delivery",
		"NewsAgency: concrete subject holding the latest news",
		"Subscriber: concrete observer",
	],
	run: runObserverDemo,
};

if (require.main === module) {
	runObserverDemo();
}
