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

import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

export interface PrintStrategy {
	print(text: string): void;
}

export class ConsolePrint implements PrintStrategy {
	constructor(private readonly out: Narrate) {}

	print(text: string): void {
		this.out(`Printing to console: ${text}`);
	}
}

export class FilePrint implements PrintStrategy {
	constructor(private readonly out: Narrate) {}

	// Only narrates; nothing touches the filesystem.
	print(text: string): void {
		this.out(`Saving to file: ${text}`);
	}
}

export class Printer {
	private strategy?: PrintStrategy;

	constructor(private readonly out: Narrate) {}

	setPrintStrategy(strategy: PrintStrategy | undefined): void {
		this.strategy = strategy;
	}

	print(text: string): void {
		if (this.strategy) {
			this.strategy.print(text);
		} else {
			this.out("No print strategy set!");
		}
	}
}

export function runDelegateDemo(out: Narrate = consoleNarrator): void {
	const printer = new Printer(out);

	printer.setPrintStrategy(new ConsolePrint(out));
	printer.print("Hello, Console!");

	printer.setPrintStrategy(new FilePrint(out));
	printer.print("Hello, File!");
}

export const delegateDemo: DemoDefinition = {
	name: "delegate",
	title: "Delegate",
	category: "structural",
	summary:
		"An object hands a task to a helper object instead of doing it itself, and the helper can " +
		"be swapped at any time. A conference organiser delegates catering and invitations to " +
		"specialists. Not one of the original Gang of Four patterns, but everywhere in practice.",
	participants: [
		"PrintStrategy: the delegate interface",
		"ConsolePrint, FilePrint: concrete delegates",
		"Printer: the delegator",
	],
	run: runDelegateDemo,
};

if (require.main === module) {
	runDelegateDemo();
}
