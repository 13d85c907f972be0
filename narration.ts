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

/**
 * Output port shared by every demo. A demo never writes to the console
 * directly; it hands each line to a narrator.
 */
export type Narrate = (line: string) => void;

export type PatternCategory = "creational" | "behavioral" | "structural";

export const PATTERN_CATEGORIES: readonly PatternCategory[] = [
	"creational",
	"behavioral",
	"structural",
];

export interface DemoDefinition {
	/** Lookup key used by the command line, e.g. `observer` */
	name: string;
	title: string;
	category: PatternCategory;
	summary: string;
	participants: readonly string[];
	run(out: Narrate): void | Promise<void>;
}

export interface Transcript {
	narrate: Narrate;
	lines: string[];
}

export const consoleNarrator: Narrate = (line) => {
	console.log(line);
};

export function createTranscript(): Transcript {
	const lines: string[] = [];
	return {
		narrate: (line) => {
			lines.push(line);
		},
		lines,
	};
}
