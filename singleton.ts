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

import { setImmediate as nextTurn } from "node:timers/promises";
import { Logger } from "./logger";
import { Mutex } from "./mutex";
import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

const logger = Logger.getLogger("singleton");

// ===== PLAIN SINGLETON =====

export class Singleton {
	private static instance: Singleton | undefined;

	private constructor(out: Narrate) {
		out("Singleton instance created.");
	}

	/**
	 * `out` only matters for the call that constructs the instance.
	 */
	public static getInstance(out: Narrate = consoleNarrator): Singleton {
		if (!Singleton.instance) {
			logger.debug("Constructing Singleton");
			Singleton.instance = new Singleton(out);
		}
		return Singleton.instance;
	}

	public displayMessage(): string {
		return "This is the Singleton instance.";
	}
}

// ===== LOCK-GUARDED SINGLETON =====

export class ThreadSafeSingleton {
	private static instance: ThreadSafeSingleton | undefined;
	private static readonly lock = new Mutex();
	private static constructions = 0;

	private constructor(out: Narrate) {
		ThreadSafeSingleton.constructions++;
		out("Thread-safe Singleton instance created.");
	}

	/**
	 * Construction has a suspension point, so concurrent first callers would
	 * each build their own instance without the lock.
	 */
	public static async getInstance(
		out: Narrate = consoleNarrator,
	): Promise<ThreadSafeSingleton> {
		const existing = ThreadSafeSingleton.instance;
		if (existing) return existing;

		return ThreadSafeSingleton.lock.runExclusive(async () => {
			if (!ThreadSafeSingleton.instance) {
				logger.debug("Constructing ThreadSafeSingleton", {
					waiting: ThreadSafeSingleton.lock.pending,
				});
				await nextTurn();
				ThreadSafeSingleton.instance = new ThreadSafeSingleton(out);
			}
			return ThreadSafeSingleton.instance;
		});
	}

	/** How many times the constructor has run in this process */
	public static get constructionCount(): number {
		return ThreadSafeSingleton.constructions;
	}

	public displayMessage(): string {
		return "This is the thread-safe Singleton instance.";
	}
}

const CONCURRENT_CALLERS = 3;

export async function runSingletonDemo(out: Narrate = consoleNarrator): Promise<void> {
	const s1 = Singleton.getInstance(out);
	out(s1.displayMessage());

	const s2 = Singleton.getInstance(out);
	if (s1 === s2) {
		out("Both instances are the same.");
	}

	const callers = await Promise.all(
		Array.from({ length: CONCURRENT_CALLERS }, () => ThreadSafeSingleton.getInstance(out)),
	);
	const [first] = callers;
	if (first) {
		out(first.displayMessage());
		if (callers.every((instance) => instance === first)) {
			out(`All ${callers.length} callers received the same instance.`);
		}
	}
}

export const singletonDemo: DemoDefinition = {
	name: "singleton",
	title: "Singleton",
	category: "creational",
	summary:
		"Guarantees a class has exactly one instance and gives a single access point to it. " +
		"Think of the one official seal a passport office stamps every document with. " +
		"The lock-guarded variant serializes first construction so that concurrent callers " +
		"still end up sharing one instance.",
	participants: [
		"Singleton: private constructor, lazily created static instance",
		"getInstance: the only way to reach the instance",
		"Mutex: serializes the check-and-construct step in the guarded variant",
	],
	run: runSingletonDemo,
};

if (require.main === module) {
	runSingletonDemo().catch((error: unknown) => {
		logger.error("Singleton demo failed", error);
		process.exitCode = 1;
	});
}
