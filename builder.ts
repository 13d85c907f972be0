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

export class Pizza {
	public crust: string = "";
	public sauce: string = "";
	public toppings: string[] = [];

	/** Toppings are space-separated with nothing after the last one. */
	public describe(): string {
		return `Pizza with ${this.crust} crust, ${this.sauce} sauce, and toppings: ${this.toppings.join(" ")}`;
	}
}

export interface PizzaBuilder {
	setCrust(): void;
	setSauce(): void;
	addToppings(): void;
	getPizza(): Pizza;
}

export class VeggiePizzaBuilder implements PizzaBuilder {
	private pizza = new Pizza();

	setCrust(): void {
		this.pizza.crust = "Thin";
	}

	setSauce(): void {
		this.pizza.sauce = "Tomato";
	}

	addToppings(): void {
		this.pizza.toppings = ["Bell Peppers", "Mushrooms", "Olives"];
	}

	getPizza(): Pizza {
		return this.pizza;
	}
}

export class MeatLoversPizzaBuilder implements PizzaBuilder {
	private pizza = new Pizza();

	setCrust(): void {
		this.pizza.crust = "Thick";
	}

	setSauce(): void {
		this.pizza.sauce = "Barbecue";
	}

	addToppings(): void {
		this.pizza.toppings = ["Pepperoni", "Sausage", "Bacon"];
	}

	getPizza(): Pizza {
		return this.pizza;
	}
}

/**
 * Owns the step order. Builders decide what each step produces.
 */
export class PizzaDirector {
	public constructPizza(builder: PizzaBuilder): void {
		builder.setCrust();
		builder.setSauce();
		builder.addToppings();
	}
}

export function runBuilderDemo(out: Narrate = consoleNarrator): void {
	const director = new PizzaDirector();
	const builders: PizzaBuilder[] = [new VeggiePizzaBuilder(), new MeatLoversPizzaBuilder()];

	for (const builder of builders) {
		director.constructPizza(builder);
		out(builder.getPizza().describe());
	}
}

export const builderDemo: DemoDefinition = {
	name: "builder",
	title: "Builder",
	category: "creational",
	summary:
		"Separates the step-by-step construction of a complex object from its representation. " +
		"A pizza is always made crust first, then sauce, then toppings, but a veggie builder and " +
		"a meat-lovers builder fill those steps differently.",
	participants: [
		"Pizza: the product",
		"PizzaBuilder: declares the construction steps",
		"VeggiePizzaBuilder, MeatLoversPizzaBuilder: concrete builders",
		"PizzaDirector: fixes the step order",
	],
	run: runBuilderDemo,
};

if (require.main === module) {
	runBuilderDemo();
}
