#!/usr/bin/env node
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

/**
 * Patterns CLI
 *
 * Lists, explains and runs the design pattern demos.
 *
 * Commands:
 * - list: every demo with its category, optionally filtered by category
 * - run: replay one or more demos (by name, by category or all of them)
 * - explain: summary and participants of a single demo
 *
 * @module cli
 */

import chalk from "chalk";
import { Command } from "commander";
import { catalog, demosIn, findDemo } from "./catalog";
import { getConfig } from "./config";
import { errorMessage } from "./errors";
import { Logger } from "./logger";
import { type DemoDefinition, type Narrate, createTranscript } from "./narration";

const logger = Logger.getLogger("cli");

export interface CliIO {
	out: (text: string) => void;
	err: (text: string) => void;
}

export interface ProgramOptions {
	io?: CliIO;
	/** Throw a CommanderError instead of exiting the process */
	exitOverride?: boolean;
}

interface ListOptions {
	category?: string;
}

interface RunOptions {
	all?: boolean;
	category?: string;
	explain?: boolean;
	json?: boolean;
}

const processIO: CliIO = {
	out: (text) => {
		process.stdout.write(text);
	},
	err: (text) => {
		process.stderr.write(text);
	},
};

function selectDemos(names: string[], options: RunOptions): DemoDefinition[] {
	const flagged = Boolean(options.all) || options.category !== undefined;
	if (names.length > 0 && flagged) {
		throw new Error("Pass pattern names or --all/--category, not both");
	}
	if (options.all) return [...catalog];
	if (options.category !== undefined) return demosIn(options.category);
	if (names.length === 0) {
		throw new Error("Name at least one pattern, or pass --all or --category");
	}
	return names.map(findDemo);
}

export function createProgram({ io = processIO, exitOverride = false }: ProgramOptions = {}): Command {
	const program = new Command();
	const println = (text = "") => io.out(`${text}\n`);

	program
		.name("patterns")
		.description("Classic object-oriented design patterns, one runnable demo each")
		.version("1.0.0")
		.configureOutput({
			writeOut: io.out,
			writeErr: io.err,
			outputError: (text, write) => write(chalk.red(text)),
		});

	if (exitOverride) {
		program.exitOverride();
	}

	const fail = (error: unknown): never => {
		logger.error("Command failed", error);
		return program.error(`Error: ${errorMessage(error)}`, {
			exitCode: 1,
			code: "patterns.failed",
		});
	};

	program
		.command("list")
		.description("List the available demos")
		.option("-c, --category <category>", "Only show one category (creational, behavioral, structural)")
		.action((options: ListOptions) => {
			try {
				const demos = options.category === undefined ? catalog : demosIn(options.category);
				for (const demo of demos) {
					println(`${chalk.bold(demo.name.padEnd(10))} ${chalk.gray(demo.category.padEnd(11))} ${demo.title}`);
				}
			} catch (error) {
				fail(error);
			}
		});

	program
		.command("explain")
		.description("Describe a pattern and its participants")
		.argument("<name>", "Pattern name, e.g. observer")
		.action((name: string) => {
			try {
				const demo = findDemo(name);
				println(chalk.bold(`${demo.title} (${demo.category})`));
				println(demo.summary);
				println();
				println("Participants:");
				for (const participant of demo.participants) {
					println(`  - ${participant}`);
				}
			} catch (error) {
				fail(error);
			}
		});

	program
		.command("run")
		.description("Run one or more demos and print their narration")
		.argument("[names...]", "Pattern names, run in the order given")
		.option("-a, --all", "Run every demo", false)
		.option("-c, --category <category>", "Run every demo in a category")
		.option("-e, --explain", "Print each pattern's summary before its demo", false)
		.option("--json", "Print one JSON object per demo instead of raw lines", false)
		.action(async (names: string[], options: RunOptions) => {
			try {
				const demos = selectDemos(names, options);
				const withHeadings = demos.length > 1 && !options.json;

				for (const demo of demos) {
					logger.debug("Running demo", { demo: demo.name });

					if (options.json) {
						const transcript = createTranscript();
						await demo.run(transcript.narrate);
						println(JSON.stringify({ demo: demo.name, lines: transcript.lines }));
						continue;
					}

					if (withHeadings) println(chalk.cyan.bold(`=== ${demo.title} ===`));
					if (options.explain) println(chalk.gray(demo.summary));

					const narrate: Narrate = (line) => println(line);
					await demo.run(narrate);
					if (withHeadings) println();
				}
			} catch (error) {
				fail(error);
			}
		});

	return program;
}

/**
 * Entry point. Resolves to the process exit code; an invalid configuration is
 * reported before any command runs.
 */
export async function main(argv: string[], io: CliIO = processIO): Promise<number> {
	try {
		getConfig();
	} catch (error) {
		io.err(`${chalk.red(`Error: ${errorMessage(error)}`)}\n`);
		return 1;
	}

	try {
		await createProgram({ io }).parseAsync(argv);
		return 0;
	} catch (error) {
		logger.error("Unexpected failure", error);
		io.err(`${chalk.red(errorMessage(error))}\n`);
		return 1;
	}
}

if (require.main === module) {
	main(process.argv).then(
		(exitCode) => {
			process.exitCode = exitCode;
		},
		(error: unknown) => {
			console.error(chalk.red(errorMessage(error)));
			process.exitCode = 1;
		},
	);
}
