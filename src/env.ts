// SPDX-License-Identifier: MIT
// Session Calculus Environment
// Value environment for evaluation and the global declaration table

import type { Declaration, Value } from "./types.js";
import { globalVal } from "./types.js";

//==============================================================================
// Value Environment (ρ)
// Maps variable names to their runtime values
//==============================================================================

export type ValueEnv = ReadonlyMap<string, Value>;

/**
 * Extend a value environment with a new binding.
 * Returns a new Map without modifying the original; the new binding shadows
 * any earlier binding of the same name.
 */
export function extendValueEnv(
	env: ValueEnv,
	name: string,
	value: Value,
): ValueEnv {
	const newEnv = new Map(env);
	newEnv.set(name, value);
	return newEnv;
}

/**
 * Extend a value environment with multiple bindings, applied in order.
 */
export function extendValueEnvMany(
	env: ValueEnv,
	bindings: [string, Value][],
): ValueEnv {
	const newEnv = new Map(env);
	for (const [name, value] of bindings) {
		newEnv.set(name, value);
	}
	return newEnv;
}

/**
 * Look up a value binding in the environment.
 */
export function lookupValue(env: ValueEnv, name: string): Value | undefined {
	return env.get(name);
}

/**
 * Create an empty value environment.
 */
export function emptyValueEnv(): ValueEnv {
	return new Map();
}

//==============================================================================
// Global Environment
// Built once from the program's function declarations
//==============================================================================

/**
 * Bind every function declaration to an unevaluated global.
 * Type declarations contribute nothing; a later declaration shadows an
 * earlier one of the same name.
 */
export function globalEnv(declarations: readonly Declaration[]): ValueEnv {
	const bindings: [string, Value][] = [];
	for (const decl of declarations) {
		if (decl.kind === "fun") {
			bindings.push([decl.name, globalVal(decl)]);
		}
	}
	return extendValueEnvMany(emptyValueEnv(), bindings);
}
