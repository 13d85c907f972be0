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
import { createTranscript } from "./narration";
import {
	type Animal,
	type AnimalVisitor,
	Elephant,
	FeedingVisitor,
	HealthCheckVisitor,
	Lion,
	Penguin,
	visitAll,
	visitorDemo,
} from "./visitor";

class NameVisitor implements AnimalVisitor<string> {
	visitLion(): string {
		return "lion";
	}

	visitPenguin(): string {
		return "penguin";
	}

	visitElephant(): string {
		return "elephant";
	}
}

describe("Visitor", () => {
	const animals: Animal[] = [new Penguin(), new Elephant(), new Lion()];

	it("should dispatch on both the animal and the visitor", () => {
		expect(new Lion().accept(new FeedingVisitor())).toBe("Feeding the lion meat.");
		expect(new Lion().accept(new HealthCheckVisitor())).toBe("Checking the lion's teeth.");
	});

	it("should keep the animals' order when visiting a group", () => {
		expect(visitAll(animals, new NameVisitor())).toEqual(["penguin", "elephant", "lion"]);
	});

	it("should support visitors with non-string results", () => {
		const legs: AnimalVisitor<number> = {
			visitLion: () => 4,
			visitPenguin: () => 2,
			visitElephant: () => 4,
		};

		expect(visitAll(animals, legs)).toEqual([2, 4, 4]);
	});

	it("should narrate the demo sequence", () => {
		const transcript = createTranscript();
		visitorDemo.run(transcript.narrate);

		expect(transcript.lines).toEqual([
			"Feeding the lion meat.",
			"Feeding the penguin fish.",
			"Feeding the elephant bananas.",
			"Checking the lion's teeth.",
			"Checking the penguin's feathers.",
			"Checking the elephant's tusks.",
		]);
	});
});
