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

import { InvalidSelectorError } from "./errors";
import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

export interface Shape {
	clone(): Shape;
	draw(): string;
}

export class Circle implements Shape {
	constructor(public readonly radius: number) {}

	clone(): Circle {
		return new Circle(this.radius);
	}

	draw(): string {
		return `Drawing a Circle with radius ${this.radius}`;
	}
}

export class Rectangle implements Shape {
	constructor(
		public readonly width: number,
		public readonly height: number,
	) {}

	clone(): Rectangle {
		return new Rectangle(this.width, this.height);
	}

	draw(): string {
		return `Drawing a Rectangle with width ${this.width} and height ${this.height}`;
	}
}

/**
 * Keeps named prototypes; `create` always hands out a fresh clone.
 */
export class ShapeRegistry {
	private prototypes = new Map<string, Shape>();

	register(name: string, prototype: Shape): void {
		this.prototypes.set(name, prototype);
	}

	names(): string[] {
		return [...this.prototypes.keys()];
	}

	create(name: string): Shape {
		const prototype = this.prototypes.get(name);
		if (!prototype) {
			throw new InvalidSelectorError(`Unknown prototype: ${name}`, name, this.names());
		}
		return prototype.clone();
	}
}

export function runPrototypeDemo(out: Narrate = consoleNarrator): void {
	const circlePrototype: Shape = new Circle(10);
	const rectanglePrototype: Shape = new Rectangle(5, 8);

	const clonedCircle = circlePrototype.clone();
	out(clonedCircle.draw());

	const clonedRectangle = rectanglePrototype.clone();
	out(clonedRectangle.draw());
}

export const prototypeDemo: DemoDefinition = {
	name: "prototype",
	title: "Prototype",
	category: "creational",
	summary:
		"Creates new objects by copying an existing one instead of building them from scratch. " +
		"A painter keeps one master stencil and traces copies from it. Clients only call clone() " +
		"and never need to know the concrete class they are copying.",
	participants: [
		"Shape: declares clone()",
		"Circle, Rectangle: concrete prototypes that copy themselves",
		"ShapeRegistry: hands out clones of named prototypes",
	],
	run: runPrototypeDemo,
};

if (require.main === module) {
	runPrototypeDemo();
}
