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

import { z } from "zod";
import { InvalidSelectorError } from "./errors";
import { Logger } from "./logger";
import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

const logger = Logger.getLogger("factory");

export interface Car {
	drive(): string;
}

export class Sedan implements Car {
	drive(): string {
		return "Driving a Sedan.";
	}
}

export class SUV implements Car {
	drive(): string {
		return "Driving an SUV.";
	}
}

export class SportsCar implements Car {
	drive(): string {
		return "Driving a Sports Car.";
	}
}

// ===== SIMPLE FACTORY =====

export const CarType = z.enum(["Sedan", "SUV", "SportsCar"]);
export type CarType = z.infer<typeof CarType>;

export class CarFactory {
	static createCar(type: string): Car {
		const parsed = CarType.safeParse(type);
		if (!parsed.success) {
			logger.debug("Rejected car type", { type });
			throw new InvalidSelectorError(`Unknown car type: ${type}`, type, CarType.options);
		}

		switch (parsed.data) {
			case "Sedan":
				return new Sedan();
			case "SUV":
				return new SUV();
			case "SportsCar":
				return new SportsCar();
		}
	}
}

// ===== FACTORY METHOD =====

export abstract class CarCreator {
	abstract createCar(): Car;

	// Works against the Car interface only; subclasses pick the concrete type.
	deliver(): string {
		return this.createCar().drive();
	}
}

export class SedanCreator extends CarCreator {
	createCar(): Car {
		return new Sedan();
	}
}

export class SUVCreator extends CarCreator {
	createCar(): Car {
		return new SUV();
	}
}

export function runFactoryDemo(out: Narrate = consoleNarrator): void {
	const sedan = CarFactory.createCar("Sedan");
	const suv = CarFactory.createCar("SUV");
	out(sedan.drive());
	out(suv.drive());

	const creators: CarCreator[] = [new SedanCreator(), new SUVCreator()];
	for (const creator of creators) {
		out(creator.deliver());
	}
}

export const factoryDemo: DemoDefinition = {
	name: "factory",
	title: "Factory",
	category: "creational",
	summary:
		"Hides object creation behind a factory so clients ask for what they want without naming " +
		"the concrete class. A car dealership takes an order for a sedan or an SUV and the factory " +
		"builds it. The simple factory maps a selector to a class and rejects unknown selectors; " +
		"the factory method lets subclasses decide which class to build.",
	participants: [
		"Car: the product interface",
		"Sedan, SUV, SportsCar: concrete products",
		"CarFactory: simple factory keyed by car type",
		"CarCreator: factory method, overridden by SedanCreator and SUVCreator",
	],
	run: runFactoryDemo,
};

if (require.main === module) {
	runFactoryDemo();
}
