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

export interface AnimalVisitor<R> {
	visitLion(lion: Lion): R;
	visitPenguin(penguin: Penguin): R;
	visitElephant(elephant: Elephant): R;
}

export interface Animal {
	accept<R>(visitor: AnimalVisitor<R>): R;
}

export class Lion implements Animal {
	accept<R>(visitor: AnimalVisitor<R>): R {
		return visitor.visitLion(this);
	}
}

export class Penguin implements Animal {
	accept<R>(visitor: AnimalVisitor<R>): R {
		return visitor.visitPenguin(this);
	}
}

export class Elephant implements Animal {
	accept<R>(visitor: AnimalVisitor<R>): R {
		return visitor.visitElephant(this);
	}
}

export class FeedingVisitor implements AnimalVisitor<string> {
	visitLion(): string {
		return "Feeding the lion meat.";
	}

	visitPenguin(): string {
		return "Feeding the penguin fish.";
	}

	visitElephant(): string {
		return "Feeding the elephant bananas.";
	}
}

export class HealthCheckVisitor implements AnimalVisitor<string> {
	visitLion(): string {
		return "Checking the lion's teeth.";
	}

	visitPenguin(): string {
		return "Checking the penguin's feathers.";
	}

	visitElephant(): string {
		return "Checking the elephant's tusks.";
	}
}

export function visitAll<R>(animals: readonly Animal[], visitor: AnimalVisitor<R>): R[] {
	return animals.map((animal) => animal.accept(visitor));
}

export function runVisitorDemo(out: Narrate = consoleNarrator): void {
	const animals: Animal[] = [new Lion(), new Penguin(), new Elephant()];

	const visitors: AnimalVisitor<string>[] = [new FeedingVisitor(), new HealthCheckVisitor()];

	for (const visitor of visitors) {
		visitAll(animals, visitor).forEach((line) => out(line));
	}
}

export const visitorDemo: DemoDefinition = {
	name: "visitor",
	title: "Visitor",
	category: "behavioral",
	summary:
		"Moves operations out of a class hierarchy into separate visitor objects, so new operations " +
		"can be added without touching the classes. A zookeeper knows how to feed or examine each " +
		"kind of animal; the animals only have to let the zookeeper in. Dispatch depends on both " +
		"the animal and the visitor.",
	participants: [
		"Animal: accept(visitor)",
		"Lion, Penguin, Elephant: concrete elements",
		"AnimalVisitor: one visit method per element type",
		"FeedingVisitor, HealthCheckVisitor: concrete operations",
	],
	run: runVisitorDemo,
};

if (require.main === module) {
	runVisitorDemo();
}
