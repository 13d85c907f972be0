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

import { adapterDemo } from "./adapter";
import { bridgeDemo } from "./bridge";
import { builderDemo } from "./builder";
import { commandDemo } from "./command";
import { compositeDemo } from "./composite";
import { decoratorDemo } from "./decorator";
import { delegateDemo } from "./delegate";
import { InvalidSelectorError } from "./errors";
import { facadeDemo } from "./facade";
import { factoryDemo } from "./factory";
import { type DemoDefinition, PATTERN_CATEGORIES, type PatternCategory } from "./narration";
import { observerDemo } from "./observer";
import { prototypeDemo } from "./prototype";
import { proxyDemo } from "./proxy";
import { singletonDemo } from "./singleton";
import { strategyDemo } from "./strategy";
import { visitorDemo } from "./visitor";

export const catalog: readonly DemoDefinition[] = [
	// ===== CREATIONAL PATTERNS =====
	prototypeDemo,
	factoryDemo,
	singletonDemo,
	builderDemo,
	// ===== BEHAVIORAL PATTERNS =====
	strategyDemo,
	commandDemo,
	observerDemo,
	visitorDemo,
	// ===== STRUCTURAL PATTERNS =====
	compositeDemo,
	bridgeDemo,
	adapterDemo,
	delegateDemo,
	proxyDemo,
	facadeDemo,
	decoratorDemo,
];

export const demoNames = (): string[] => catalog.map((demo) => demo.name);

export function findDemo(name: string): DemoDefinition {
	const wanted = name.trim().toLowerCase();
	const demo = catalog.find((candidate) => candidate.name === wanted);
	if (!demo) {
		throw new InvalidSelectorError(`Unknown pattern: ${name}`, name, demoNames());
	}
	return demo;
}

const isCategory = (value: string): value is PatternCategory =>
	PATTERN_CATEGORIES.some((category) => category === value);

export function demosIn(category: string): DemoDefinition[] {
	const wanted = category.trim().toLowerCase();
	if (!isCategory(wanted)) {
		throw new InvalidSelectorError(`Unknown category: ${category}`, category, PATTERN_CATEGORIES);
	}
	return catalog.filter((demo) => demo.category === wanted);
}
