// SPDX-License-Identifier: MIT
// Shared helper functions: variant checks, arithmetic and bounded recursion

import { type ValueEnv, extendValueEnv, extendValueEnvMany } from "../env.js";
import { SessionError } from "../errors.js";
import {
	type ArithKind,
	type ChannelVal,
	type ClosureVal,
	type Expr,
	type LabelVal,
	type NatRecExpr,
	type PairVal,
	type Value,
	intVal,
	isChannel,
	isClosure,
	isInt,
	isLabel,
	isPair,
} from "../types.js";
import type { EvalContext } from "./types.js";

//==============================================================================
// Variant checks
//==============================================================================

export function expectInt(v: Value, context: string): bigint {
	if (!isInt(v)) throw SessionError.typeMismatch("int", v, context);
	return v.value;
}

export function expectPair(v: Value, context: string): PairVal {
	if (!isPair(v)) throw SessionError.typeMismatch("pair", v, context);
	return v;
}

export function expectClosure(v: Value, context: string): ClosureVal {
	if (!isClosure(v)) throw SessionError.typeMismatch("closure", v, context);
	return v;
}

export function expectLabel(v: Value, context: string): LabelVal {
	if (!isLabel(v)) throw SessionError.typeMismatch("label", v, context);
	return v;
}

export function expectChannel(v: Value, context: string): ChannelVal {
	if (!isChannel(v)) throw SessionError.typeMismatch("channel", v, context);
	return v;
}

//==============================================================================
// Arithmetic
//==============================================================================

export type BinaryOp = (a: bigint, b: bigint) => bigint;

/** Integer operators; `div` truncates toward zero */
export const arithOps: Readonly<Record<ArithKind, BinaryOp>> = {
	plus: (a, b) => a + b,
	minus: (a, b) => a - b,
	times: (a, b) => a * b,
	div: (a, b) => {
		if (b === 0n) throw SessionError.divisionByZero();
		return a / b;
	},
};

/** Literal expression for a host integer, used to desugar negate and succ */
export function intLit(value: number): Expr {
	return { kind: "int", value };
}

/**
 * Evaluate `left` then `right`, require both to be integers, and apply `op`.
 */
export async function applyBinaryOp(
	op: BinaryOp,
	left: Expr,
	right: Expr,
	env: ValueEnv,
	ctx: EvalContext,
): Promise<Value> {
	const a = expectInt(await ctx.svc.evalExpr(left, env, ctx), "arithmetic operand");
	const b = expectInt(await ctx.svc.evalExpr(right, env, ctx), "arithmetic operand");
	return intVal(op(a, b));
}

//==============================================================================
// Bounded natural recursion
//==============================================================================

/**
 * natRec over index n: the zero case for n = 0, otherwise the step case with
 * `counter ↦ n` and `acc ↦ natRec(n - 1)`.
 *
 * Unrolled bottom-up: the zero case is evaluated first, then the step case
 * for 1..n, which is the order the recursive definition evaluates them in.
 * A negative index has no base case to reach and faults.
 */
export async function evalNatRec(
	expr: NatRecExpr,
	env: ValueEnv,
	ctx: EvalContext,
): Promise<Value> {
	const n = expectInt(await ctx.svc.evalExpr(expr.index, env, ctx), "natRec index");
	if (n < 0n) throw SessionError.negativeRecursionIndex(n);

	// Below the top level the zero case runs with the counter at 0
	const zeroEnv = n === 0n ? env : extendValueEnv(env, expr.counter, intVal(0));
	let acc = await ctx.svc.evalExpr(expr.zero, zeroEnv, ctx);
	for (let i = 1n; i <= n; i++) {
		// counter is bound last so it wins if both names coincide
		const stepEnv = extendValueEnvMany(env, [[expr.acc, acc], [expr.counter, intVal(i)]]);
		acc = await ctx.svc.evalExpr(expr.step, stepEnv, ctx);
	}
	return acc;
}
