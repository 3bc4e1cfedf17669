#!/usr/bin/env node
// SPDX-License-Identifier: MIT
// Session Calculus CLI
// Reads a JSON program, evaluates `main`, prints the resulting value

import { USAGE, guardDeadlock, loadProgram, parseArgs, readProgramText } from "./cli-utils.js";
import { isSessionError } from "./errors.js";
import { runProgram } from "./interpret.js";
import { consoleTracer, traceFromEnv } from "./trace.js";
import { formatValue } from "./types.js";

async function main(argv: string[]): Promise<number> {
	const { path, options, errors } = parseArgs(argv);
	if (errors.length > 0) {
		for (const error of errors) console.error(error);
		console.error(USAGE);
		return 2;
	}
	if (options.help) {
		console.log(USAGE);
		return 0;
	}

	const loaded = loadProgram(await readProgramText(path));
	if (!loaded.valid || loaded.value === undefined) {
		for (const error of loaded.errors) console.error(`${error.path}: ${error.message}`);
		return 1;
	}

	try {
		const value = await guardDeadlock(runProgram(loaded.value, {
			tracer: consoleTracer(options.trace || traceFromEnv()),
			...(options.maxSteps !== undefined ? { maxSteps: options.maxSteps } : {}),
		}));
		console.log(formatValue(value));
		return 0;
	} catch (e) {
		if (!isSessionError(e)) throw e;
		console.error(`${e.code}: ${e.message}`);
		return 1;
	}
}

// Forked processes still running or blocked when main finishes are abandoned
main(process.argv.slice(2)).then(
	(code) => { process.stdout.write("", () => process.exit(code)); },
	(error: unknown) => {
		console.error(error);
		process.exit(1);
	},
);
