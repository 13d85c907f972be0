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

export interface RouteStrategy {
	calculateRoute(): string;
}

export class ShortestRoute implements RouteStrategy {
	calculateRoute(): string {
		return "Calculating the shortest route.";
	}
}

export class FastestRoute implements RouteStrategy {
	calculateRoute(): string {
		return "Calculating the fastest route.";
	}
}

export class ScenicRoute implements RouteStrategy {
	calculateRoute(): string {
		return "Calculating the scenic route.";
	}
}

export class GPSNavigator {
	private strategy: RouteStrategy | undefined;

	setStrategy(strategy: RouteStrategy | undefined): void {
		this.strategy = strategy;
	}

	navigate(out: Narrate): void {
		if (this.strategy) {
			out(this.strategy.calculateRoute());
		} else {
			out("No strategy set.");
		}
	}
}

export function runStrategyDemo(out: Narrate = consoleNarrator): void {
	const navigator = new GPSNavigator();

	const strategies: readonly RouteStrategy[] = [
		new ShortestRoute(),
		new FastestRoute(),
		new ScenicRoute(),
	];
	for (const strategy of strategies) {
		navigator.setStrategy(strategy);
		navigator.navigate(out);
	}
}

export const strategyDemo: DemoDefinition = {
	name: "strategy",
	title: "Strategy",
	category: "behavioral",
	summary:
		"Defines a family of interchangeable algorithms and lets the client swap them at run time. " +
		"A GPS can plan the shortest, the fastest or the scenic route without its own code changing.",
	participants: [
		"RouteStrategy: the algorithm interface",
		"ShortestRoute, FastestRoute, ScenicRoute: concrete strategies",
		"GPSNavigator: the context that delegates to whichever strategy is set",
	],
	run: runStrategyDemo,
};

if (require.main === module) {
	runStrategyDemo();
}
