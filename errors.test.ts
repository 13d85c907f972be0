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
import { ConfigError, InvalidSelectorError, PatternsError, errorMessage, isPatternsError } from "./errors";

describe("PatternsError", () => {
	it("should carry the subclass name and code", () => {
		const error = new InvalidSelectorError("Unknown car type: Truck", "Truck", ["Sedan"]);

		expect(error).toBeInstanceOf(PatternsError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("InvalidSelectorError");
		expect(error.code).toBe("INVALID_SELECTOR");
		expect(error.toString()).toBe("InvalidSelectorError [INVALID_SELECTOR]: Unknown car type: Truck");
	});

	it("should join config issues into the message", () => {
		const error = new ConfigError(["A: bad", "B: worse"]);

		expect(error.message).toBe("Invalid configuration: A: bad; B: worse");
		expect(error.issues).toEqual(["A: bad", "B: worse"]);
	});
});

describe("isPatternsError", () => {
	it("should only accept errors from this package", () => {
		expect(isPatternsError(new ConfigError([]))).toBe(true);
		expect(isPatternsError(new Error("plain"))).toBe(false);
		expect(isPatternsError("text")).toBe(false);
	});
});

describe("errorMessage", () => {
	it("should prefer an error's message and stringify anything else", () => {
		expect(errorMessage(new Error("bad"))).toBe("bad");
		expect(errorMessage(404)).toBe("404");
	});
});
