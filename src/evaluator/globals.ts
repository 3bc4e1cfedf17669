// SPDX-License-Identifier: MIT
// Global declaration resolver
// Curries N-parameter declarations into chained closures; never memoizes

import { type ValueEnv, extendValueEnv } from "../env.js";
import { type FunctionDecl, type Param, type Value, closureVal } from "../types.js";
import type { EvalContext } from "./types.js";

/**
 * Resolve a global declaration in the environment that refers to it, so the
 * body sees the caller's bindings as well as the other globals.
 * Called once per reference: every reference builds its own closure chain
 * and re-evaluates the body.
 */
export function resolveGlobal(decl: FunctionDecl, env: ValueEnv, ctx: EvalContext): Promise<Value> {
	return resolveParams(decl, decl.params, env, ctx);
}

function resolveParams(
	decl: FunctionDecl,
	params: readonly Param[],
	env: ValueEnv,
	ctx: EvalContext,
): Promise<Value> {
	const [param, ...rest] = params;
	if (param === undefined) {
		return ctx.svc.evalExpr(decl.body, env, ctx);
	}
	return Promise.resolve(
		closureVal((arg) =>
			resolveParams(decl, rest, extendValueEnv(env, param.name, arg), ctx),
		),
	);
}
