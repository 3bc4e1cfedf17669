// SPDX-License-Identifier: MIT
// Session Calculus Driver
// Validates a program document, finds `main` and evaluates it

import { globalEnv, lookupValue } from "./env.js";
import { SessionError } from "./errors.js";
import { Evaluator, type EvalOptions } from "./evaluator.js";
import { isGlobal, type Program, type Value } from "./types.js";
import { validateProgram } from "./validator.js";

/** Name of the declaration a program runs */
export const MAIN = "main";

/**
 * Evaluate the `main` declaration of an already validated program.
 * Only function declarations are considered; a type declaration named
 * `main` does not count.
 */
export async function runProgram(program: Program, options?: EvalOptions): Promise<Value> {
	const globals = globalEnv(program.declarations);
	const main = lookupValue(globals, MAIN);
	if (main === undefined || !isGlobal(main)) {
		throw SessionError.noMainDeclaration();
	}
	return new Evaluator(globals).resolve(main.decl, options);
}

/**
 * Validate an untrusted program document and evaluate its `main`.
 * An invalid document fails with a ValidationError before anything runs.
 */
export async function interpret(doc: unknown, options?: EvalOptions): Promise<Value> {
	const result = validateProgram(doc);
	if (!result.valid || result.value === undefined) {
		throw SessionError.validation(result.errors);
	}
	return runProgram(result.value, options);
}
