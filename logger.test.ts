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

import { readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import winston from "winston";
import { LogLevel, Logger } from "./logger";

function captureTransport() {
	const lines: string[] = [];
	const stream = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			lines.push(chunk.toString().trimEnd());
			callback();
		},
	});
	return { lines, transport: new winston.transports.Stream({ stream }) };
}

describe("Logger", () => {
	it("should hand back the same logger for the same name", () => {
		const first = Logger.getLogger("registry-check");

		expect(Logger.getLogger("registry-check")).toBe(first);
		expect(first.name).toBe("registry-check");
	});

	it("should format level, name, message and metadata on one line", async () => {
		const { lines, transport } = captureTransport();
		const logger = Logger.getLogger("format-check", { minLevel: LogLevel.DEBUG, transports: [transport] });

		logger.debug("Running demo", { demo: "observer" });
		logger.info("plain");

		await vi.waitFor(() => expect(lines).toHaveLength(2));
		expect(lines).toEqual(['DEBUG [format-check] Running demo {"demo":"observer"}', "INFO [format-check] plain"]);
	});

	it("should drop records below the minimum level", async () => {
		const { lines, transport } = captureTransport();
		const logger = Logger.getLogger("level-check", { minLevel: LogLevel.WARN, transports: [transport] });

		logger.debug("hidden");
		logger.info("hidden too");
		logger.warn("shown");

		await vi.waitFor(() => expect(lines).toHaveLength(1));
		expect(logger.level).toBe("warn");
		expect(lines).toEqual(["WARN [level-check] shown"]);
	});

	it("should append the error's message to the metadata", async () => {
		const { lines, transport } = captureTransport();
		const logger = Logger.getLogger("error-check", { minLevel: LogLevel.ERROR, transports: [transport] });

		logger.error("Command failed", new Error("bad input"), { command: "run" });

		await vi.waitFor(() => expect(lines).toHaveLength(1));
		expect(lines).toEqual(['ERROR [error-check] Command failed {"command":"run","error":"bad input"}']);
	});

	it("should prefix a timestamp when asked", async () => {
		const { lines, transport } = captureTransport();
		const logger = Logger.getLogger("timestamp-check", {
			minLevel: LogLevel.INFO,
			includeTimestamp: true,
			transports: [transport],
		});

		logger.info("tick");

		await vi.waitFor(() => expect(lines).toHaveLength(1));
		expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ INFO \[timestamp-check\] tick$/);
	});

	describe("default transports", () => {
		const logFile = join(tmpdir(), `patterns-logger-${process.pid}.log`);

		afterEach(() => {
			vi.unstubAllEnvs();
			vi.resetModules();
			rmSync(logFile, { force: true });
		});

		async function freshLogger() {
			vi.resetModules();
			return import("./logger");
		}

		it("should not read the configuration until the first record", async () => {
			vi.stubEnv("PATTERNS_LOG_LEVEL", "verbose");
			const fresh = await freshLogger();

			const logger = fresh.Logger.getLogger("lazy-check");

			expect(() => logger.warn("first record")).toThrow("Invalid configuration: PATTERNS_LOG_LEVEL: ");
		});

		it("should send every level to stderr and nothing to stdout", async () => {
			vi.stubEnv("PATTERNS_LOG_FILE", "");
			const fresh = await freshLogger();
			const logger = fresh.Logger.getLogger("stderr-check");

			expect(logger.transports).toHaveLength(1);
			const [consoleTransport] = logger.transports;
			expect(consoleTransport).toBeInstanceOf(winston.transports.Console);
			if (consoleTransport instanceof winston.transports.Console) {
				expect(Object.keys(consoleTransport.stderrLevels).sort()).toEqual(["debug", "error", "info", "warn"]);
			}
		});

		it("should also write JSON lines to the configured log file", async () => {
			vi.stubEnv("PATTERNS_LOG_FILE", logFile);
			const fresh = await freshLogger();
			const logger = fresh.Logger.getLogger("file-check", { minLevel: fresh.LogLevel.INFO });

			logger.info("Writing to file", { demo: "bridge" });

			expect(logger.transports).toHaveLength(2);
			await vi.waitFor(() => expect(readFileSync(logFile, "utf8")).toContain("\n"), { timeout: 2000 });
			const records = readFileSync(logFile, "utf8").trim().split("\n");
			expect(records).toHaveLength(1);

			const record: unknown = JSON.parse(records[0] ?? "");
			expect(record).toMatchObject({ level: "info", message: "Writing to file", demo: "bridge" });
			expect(record).toHaveProperty("timestamp", expect.any(String));
		});
	});
});
