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

import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

const blankToUndefined = (value: unknown) =>
	typeof value === "string" && value.trim() === "" ? undefined : value;

const configSchema = z.object({
	PATTERNS_LOG_LEVEL: z.preprocess(
		blankToUndefined,
		z.enum(["error", "warn", "info", "debug"]).default("warn"),
	),
	PATTERNS_LOG_FILE: z.preprocess(blankToUndefined, z.string().optional()),
});

export interface Config {
	logLevel: "error" | "warn" | "info" | "debug";
	logFile?: string;
}

/**
 * Validates the given environment. Unknown variables are ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
	const parsed = configSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}
	return {
		logLevel: parsed.data.PATTERNS_LOG_LEVEL,
		logFile: parsed.data.PATTERNS_LOG_FILE,
	};
}

let cached: Config | undefined;

export function getConfig(): Config {
	if (!cached) {
		dotenv.config();
		cached = loadConfig(process.env);
	}
	return cached;
}
