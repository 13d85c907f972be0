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

export interface Coffee {
	getDescription(): string;
	getCost(): number;
}

export class PlainCoffee implements Coffee {
	getDescription(): string {
		return "Plain Coffee";
	}

	getCost(): number {
		return 2.0;
	}
}

export abstract class CoffeeDecorator implements Coffee {
	constructor(protected readonly coffee: Coffee) {}

	getDescription(): string {
		return this.coffee.getDescription();
	}

	getCost(): number {
		return this.coffee.getCost();
	}
}

export class MilkDecorator extends CoffeeDecorator {
	getDescription(): string {
		return `${this.coffee.getDescription()}, Milk`;
	}

	getCost(): number {
		return this.coffee.getCost() + 0.5;
	}
}

export class SugarDecorator extends CoffeeDecorator {
	getDescription(): string {
		return `${this.coffee.getDescription()}, Sugar`;
	}

	getCost(): number {
		return this.coffee.getCost() + 0.2;
	}
}

export class CaramelDecorator extends CoffeeDecorator {
	getDescription(): string {
		return `${this.coffee.getDescription()}, Caramel`;
	}

	getCost(): number {
		return this.coffee.getCost() + 0.7;
	}
}

/**
 * Six significant digits, trailing zeros dropped: `2` -> "2",
 * `3.4000000000000004` -> "3.4".
 */
export const formatCost = (cost: number): string => String(Number(cost.toPrecision(6)));

const describe = (coffee: Coffee) =>
	`${coffee.getDescription()} costs $${formatCost(coffee.getCost())}`;

export function runDecoratorDemo(out: Narrate = consoleNarrator): void {
	let myCoffee: Coffee = new PlainCoffee();
	out(describe(myCoffee));

	myCoffee = new MilkDecorator(myCoffee);
	out(describe(myCoffee));

	myCoffee = new SugarDecorator(myCoffee);
	out(describe(myCoffee));

	myCoffee = new CaramelDecorator(myCoffee);
	out(describe(myCoffee));
}

export const decoratorDemo: DemoDefinition = {
	name: "decorator",
	title: "Decorator",
	category: "structural",
	summary:
		"Adds behaviour to an object by wrapping it instead of changing its class. Plain coffee " +
		"gets milk, sugar and caramel layered on top, and each layer adds to the description and " +
		"the price.",
	participants: [
		"Coffee: the component interface",
		"PlainCoffee: the concrete component",
		"CoffeeDecorator: forwards to the wrapped coffee",
		"MilkDecorator, SugarDecorator, CaramelDecorator: concrete decorators",
	],
	run: runDecoratorDemo,
};

if (require.main === module) {
	runDecoratorDemo();
}
