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

import winston from "winston";
import { getConfig } from "./config";
import { errorMessage } from "./errors";

export enum LogLevel {
	ERROR = "error",
	WARN = "warn",
	INFO = "info",
	DEBUG = "debug",
}

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
	/** Defaults to the configured `PATTERNS_LOG_LEVEL` */
	minLevel?: LogLevel;
	includeTimestamp?: boolean;
	/** Replaces the default stderr/file transports, mainly for tests */
	transports?: winston.transport[];
}

const ALL_LEVELS = Object.values(LogLevel);

/**
 * Named diagnostic logger on top of winston.
 *
 * Records always go to stderr: stdout belongs to demo narration.
 * The configuration is read when the first record is written, not when the
 * logger is created.
 */
export class Logger {
	private static readonly registry = new Map<string, Logger>();

	private backend: winston.Logger | undefined;

	private constructor(
		readonly name: string,
		private readonly options: LoggerOptions,
	) {}

	private get backendLogger(): winston.Logger {
		if (!this.backend) {
			this.backend = this.createBackend();
		}
		return this.backend;
	}

	private createBackend(): winston.Logger {
		const { options } = this;
		const config = getConfig();
		const line = winston.format.printf((info) => {
			const { level, message, timestamp, ...meta } = info;
			const prefix = typeof timestamp === "string" ? `${timestamp} ` : "";
			const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
			return `${prefix}${level.toUpperCase()} [${this.name}] ${String(message)}${extra}`;
		});

		return winston.createLogger({
			level: options.minLevel ?? config.logLevel,
			format: options.includeTimestamp
				? winston.format.combine(winston.format.timestamp(), line)
				: line,
			transports: options.transports ?? Logger.defaultTransports(config.logFile),
		});
	}

	private static defaultTransports(logFile: string | undefined): winston.transport[] {
		const transports: winston.transport[] = [
			new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
		];
		if (logFile) {
			transports.push(
				new winston.transports.File({
					filename: logFile,
					format: winston.format.combine(
						winston.format.timestamp(),
						winston.format.json(),
					),
				}),
			);
		}
		return transports;
	}

	/**
	 * Returns the logger registered under `name`, creating it on first use.
	 * Options only apply to that first call.
	 */
	static getLogger(name: string, options: LoggerOptions = {}): Logger {
		let logger = Logger.registry.get(name);
		if (!logger) {
			logger = new Logger(name, options);
			Logger.registry.set(name, logger);
		}
		return logger;
	}

	get transports(): readonly winston.transport[] {
		return this.backendLogger.transports;
	}

	get level(): string {
		return this.backendLogger.level;
	}

	debug(message: string, meta?: LogMeta): void {
		this.backendLogger.log(LogLevel.DEBUG, message, meta ?? {});
	}

	info(message: string, meta?: LogMeta): void {
		this.backendLogger.log(LogLevel.INFO, message, meta ?? {});
	}

	warn(message: string, meta?: LogMeta): void {
		this.backendLogger.log(LogLevel.WARN, message, meta ?? {});
	}

	error(message: string, error?: unknown, meta?: LogMeta): void {
		this.backendLogger.log(
			LogLevel.ERROR,
			message,
			error === undefined ? (meta ?? {}) : { ...meta, error: errorMessage(error) },
		);
	}
}
