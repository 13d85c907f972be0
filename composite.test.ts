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

import { describe, expect, it } from "vitest";
import { Designer, Developer, Manager, compositeDemo } from "./composite";
import { createTranscript } from "./narration";

function buildOrg() {
	const cto = new Manager("CTO");
	const web = new Manager("Web Lead");
	const data = new Manager("Data Lead");

	web.addEmployee(new Developer("Ann", "Frontend"));
	web.addEmployee(new Designer("Ben", "Visual"));
	data.addEmployee(new Developer("Cal", "Pipelines"));

	cto.addEmployee(web);
	cto.addEmployee(new Designer("Dee", "Brand"));
	cto.addEmployee(data);
	return { cto, web, data };
}

describe("Composite", () => {
	it("should visit every node once, parents before children, siblings in insertion order", () => {
		const { cto } = buildOrg();
		const transcript = createTranscript();

		cto.showDetails(transcript.narrate);

		expect(transcript.lines).toEqual([
			"Manager: CTO",
			"Manager: Web Lead",
			"Developer: Ann, Position: Frontend",
			"Designer: Ben, Position: Visual",
			"Designer: Dee, Position: Brand",
			"Manager: Data Lead",
			"Developer: Cal, Position: Pipelines",
		]);
		expect(transcript.lines).toHaveLength(cto.headcount());
	});

	it("should count every node including the composite itself", () => {
		const { cto, web, data } = buildOrg();

		expect(cto.headcount()).toBe(7);
		expect(web.headcount()).toBe(3);
		expect(data.headcount()).toBe(2);
		expect(new Manager("Solo").headcount()).toBe(1);
	});

	it("should treat a leaf like any other employee", () => {
		const transcript = createTranscript();
		new Developer("Eve", "Platform").showDetails(transcript.narrate);

		expect(transcript.lines).toEqual(["Developer: Eve, Position: Platform"]);
	});

	it("should remove only the first matching member", () => {
		const manager = new Manager("Lead");
		const dev = new Developer("Fay", "Tools");
		manager.addEmployee(dev);
		manager.addEmployee(dev);

		manager.removeEmployee(dev);
		expect(manager.teamSize).toBe(1);

		manager.removeEmployee(new Developer("Fay", "Tools"));
		expect(manager.teamSize).toBe(1);
	});

	it("should narrate the demo hierarchy", () => {
		const transcript = createTranscript();
		compositeDemo.run(transcript.narrate);

		expect(transcript.lines).toEqual([
			"Manager: General Manager",
			"Manager: Team Lead",
			"Developer: Alice, Position: Frontend Developer",
			"Developer: Bob, Position: Backend Developer",
			"Designer: Charlie, Position: UX Designer",
		]);
	});
});
