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

export type PatternsErrorCode = "INVALID_SELECTOR" | "INVALID_CONFIG";

/**
 * Base class for every error this collection raises on purpose.
 */
export class PatternsError extends Error {
	readonly code: PatternsErrorCode;

	constructor(code: PatternsErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}

	toString(): string {
		return `${this.name} [${this.code}]: ${this.message}`;
	}
}

/**
 * Raised when a selector (car type, prototype key, demo or category name)
 * has nothing mapped to it.
 */
export class InvalidSelectorError extends PatternsError {
	readonly selector: string;
	readonly accepted: readonly string[];

	constructor(message: string, selector: string, accepted: readonly string[]) {
		super("INVALID_SELECTOR", message);
		this.selector = selector;
		this.accepted = accepted;
	}
}

export class ConfigError extends PatternsError {
	readonly issues: readonly string[];

	constructor(issues: readonly string[]) {
		super("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`);
		this.issues = issues;
	}
}

export const isPatternsError = (value: unknown): value is PatternsError =>
	value instanceof PatternsError;

export const errorMessage = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
