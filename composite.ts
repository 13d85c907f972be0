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

export interface Employee {
	showDetails(out: Narrate): void;
	/** Nodes in this subtree, this one included */
	headcount(): number;
}

export class Developer implements Employee {
	constructor(
		private readonly name: string,
		private readonly position: string,
	) {}

	showDetails(out: Narrate): void {
		out(`Developer: ${this.name}, Position: ${this.position}`);
	}

	headcount(): number {
		return 1;
	}
}

export class Designer implements Employee {
	constructor(
		private readonly name: string,
		private readonly position: string,
	) {}

	showDetails(out: Narrate): void {
		out(`Designer: ${this.name}, Position: ${this.position}`);
	}

	headcount(): number {
		return 1;
	}
}

/**
 * Owns its team in insertion order. Nothing stops a caller from adding a
 * manager to its own subtree; doing so makes traversal recurse forever.
 */
export class Manager implements Employee {
	private team: Employee[] = [];

	constructor(private readonly name: string) {}

	addEmployee(employee: Employee): void {
		this.team.push(employee);
	}

	removeEmployee(employee: Employee): void {
		const index = this.team.indexOf(employee);
		if (index !== -1) {
			this.team.splice(index, 1);
		}
	}

	get teamSize(): number {
		return this.team.length;
	}

	showDetails(out: Narrate): void {
		out(`Manager: ${this.name}`);
		for (const employee of this.team) {
			employee.showDetails(out);
		}
	}

	headcount(): number {
		return this.team.reduce((total, employee) => total + employee.headcount(), 1);
	}
}

export function runCompositeDemo(out: Narrate = consoleNarrator): void {
	const teamLead = new Manager("Team Lead");
	teamLead.addEmployee(new Developer("Alice", "Frontend Developer"));
	teamLead.addEmployee(new Developer("Bob", "Backend Developer"));
	teamLead.addEmployee(new Designer("Charlie", "UX Designer"));

	const generalManager = new Manager("General Manager");
	generalManager.addEmployee(teamLead);

	generalManager.showDetails(out);
}

export const compositeDemo: DemoDefinition = {
	name: "composite",
	title: "Composite",
	category: "structural",
	summary:
		"Lets individual objects and groups of objects be treated the same way, which suits " +
		"part-whole trees. In a company, asking the general manager for details walks down through " +
		"every manager and employee beneath them.",
	participants: [
		"Employee: the common interface",
		"Developer, Designer: leaves",
		"Manager: composite that owns an ordered team",
	],
	run: runCompositeDemo,
};

if (require.main === module) {
	runCompositeDemo();
}
