// SPDX-License-Identifier: MIT
/**
 * Session Calculus CLI Utilities
 *
 * Extracted CLI functions for testability:
 * - Argument parsing (flags and options)
 * - Program loading (JSON text to a validated program)
 * - Deadlock detection for the main process
 * - Usage text
 */

import type { EventEmitter } from "node:events";
import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";

import { SessionError, invalidResult, type ValidationResult } from "./errors.js";
import type { Program } from "./types.js";
import { validateProgram } from "./validator.js";

/**
 * CLI options interface
 */
export interface Options {
  trace: boolean;
  help: boolean;
  maxSteps?: number;
}

export const USAGE = [
	"Usage: session-calculus [file] [options]",
	"",
	"Evaluates the `main` declaration of a JSON program (read from stdin when no file is given).",
	"",
	"Options:",
	"  -t, --trace          Print evaluation trace lines to stderr",
	"      --max-steps <n>  Abort after n evaluation steps",
	"  -h, --help           Show this help",
	"",
	"Environment:",
	"  SESSION_TRACE=1      Same as --trace",
].join("\n");

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--trace": case "-t": options.trace = true; return true;
	case "--help": case "-h": options.help = true; return true;
	default: return false;
	}
}

function parsePositiveInt(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value)) return undefined;
	const n = Number(value);
	return n > 0 ? n : undefined;
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 * @returns Object with the program path (null for stdin), parsed options
 *   and any argument errors
 */
export function parseArgs(args: string[]): { path: string | null; options: Options; errors: string[] } {
	const options: Options = { trace: false, help: false };
	const errors: string[] = [];
	let path: string | null = null;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;
		if (arg === "--max-steps") {
			const steps = parsePositiveInt(args[i + 1]);
			if (steps === undefined) {
				errors.push("--max-steps expects a positive integer");
			} else {
				options.maxSteps = steps;
				i++;
			}
			continue;
		}
		if (arg.startsWith("-")) {
			errors.push("Unknown option: " + arg);
			continue;
		}
		if (path !== null) {
			errors.push("Unexpected argument: " + arg);
			continue;
		}
		path = arg;
	}

	return { path, options, errors };
}

/**
 * Parse program text as JSON and validate it
 *
 * @returns Validation result; malformed JSON is reported at path "$"
 */
export function loadProgram(source: string): ValidationResult<Program> {
	let doc: unknown;
	try {
		doc = JSON.parse(source);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return invalidResult<Program>([{ path: "$", message: "Invalid JSON: " + message }]);
	}
	return validateProgram(doc);
}

/**
 * Read program text from a file, or from stdin when path is null
 */
export async function readProgramText(path: string | null): Promise<string> {
	if (path === null) {
		return text(process.stdin);
	}
	return readFile(path, "utf-8");
}

/** The part of `process` that reports an emptied event loop */
export type DrainSignal = Pick<EventEmitter, "once" | "off">;

/**
 * Settle with `run`, or fail with a Deadlock fault if `beforeExit` fires
 * first. The event loop only drains while `run` is pending when every
 * process is blocked on a receive, so nothing can ever resume it.
 */
export function guardDeadlock<T>(run: Promise<T>, host: DrainSignal = process): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const onDrain = (): void => {
			reject(SessionError.deadlock());
		};
		host.once("beforeExit", onDrain);
		run.then(
			(value) => {
				host.off("beforeExit", onDrain);
				resolve(value);
			},
			(error: unknown) => {
				host.off("beforeExit", onDrain);
				reject(error);
			},
		);
	});
}
