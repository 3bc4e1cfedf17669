// SPDX-License-Identifier: MIT
// Session Calculus Type Definitions
// Runtime Value domain; the expression AST lives in zod-schemas.ts

import type { ChannelQueue } from "./async-effects.js";
import type { FunctionDecl } from "./zod-schemas.js";

export type {
	Expr, ExprKind, IntLiteral,
	UnitExpr, VarExpr, LabelExpr, IntExpr, NatExpr,
	ArithExpr, ArithKind, NegateExpr, SuccExpr,
	LetExpr, LetPairExpr, PairExpr, FstExpr, SndExpr,
	LambdaExpr, AppExpr,
	ForkExpr, NewExpr, SendExpr, RecvExpr,
	CaseExpr, CaseBranch, NatRecExpr,
	FunctionDecl, TypeDecl, Declaration, Program, Param,
} from "./zod-schemas.js";

//==============================================================================
// Value Domain (v - runtime values)
//==============================================================================

export type Value =
	| UnitVal
	| LabelVal
	| IntVal
	| PairVal
	| ClosureVal
	| ChannelVal
	| GlobalVal;

export interface UnitVal {
	kind: "unit";
}

export interface LabelVal {
	kind: "label";
	name: string;
}

export interface IntVal {
	kind: "int";
	value: bigint;
}

export interface PairVal {
	kind: "pair";
	first: Value;
	second: Value;
}

/**
 * A one-argument function value. Whatever environment it closes over lives
 * inside `apply`.
 */
export interface ClosureVal {
	kind: "closure";
	apply: (arg: Value) => Promise<Value>;
}

/**
 * One end of a session channel. `read` is the queue this end receives from,
 * `write` the queue it sends on; the partner endpoint holds them swapped.
 */
export interface ChannelVal {
	kind: "channel";
	read: ChannelQueue;
	write: ChannelQueue;
}

/** A global declaration that is resolved afresh at every reference */
export interface GlobalVal {
	kind: "global";
	decl: FunctionDecl;
}

export type ValueKind = Value["kind"];

//==============================================================================
// Value Constructors
//==============================================================================

export const unitVal = (): UnitVal => ({ kind: "unit" });
export const labelVal = (name: string): LabelVal => ({ kind: "label", name });
export const intVal = (value: bigint | number): IntVal => ({
	kind: "int",
	value: BigInt(value),
});
export const pairVal = (first: Value, second: Value): PairVal => ({
	kind: "pair",
	first,
	second,
});
export const closureVal = (apply: (arg: Value) => Promise<Value>): ClosureVal => ({
	kind: "closure",
	apply,
});
export const channelVal = (read: ChannelQueue, write: ChannelQueue): ChannelVal => ({
	kind: "channel",
	read,
	write,
});
export const globalVal = (decl: FunctionDecl): GlobalVal => ({ kind: "global", decl });

//==============================================================================
// Type Guards
//==============================================================================

export function isUnit(v: Value): v is UnitVal {
	return v.kind === "unit";
}

export function isLabel(v: Value): v is LabelVal {
	return v.kind === "label";
}

export function isInt(v: Value): v is IntVal {
	return v.kind === "int";
}

export function isPair(v: Value): v is PairVal {
	return v.kind === "pair";
}

export function isClosure(v: Value): v is ClosureVal {
	return v.kind === "closure";
}

export function isChannel(v: Value): v is ChannelVal {
	return v.kind === "channel";
}

export function isGlobal(v: Value): v is GlobalVal {
	return v.kind === "global";
}

//==============================================================================
// Rendering
//==============================================================================

/**
 * Render a value for display.
 *
 * @example
 * formatValue(pairVal(intVal(5), labelVal("Ok"))) // "<5, 'Ok>"
 */
export function formatValue(v: Value): string {
	switch (v.kind) {
	case "unit":
		return "()";
	case "label":
		return "'" + v.name;
	case "int":
		return v.value.toString();
	case "pair":
		return "<" + formatValue(v.first) + ", " + formatValue(v.second) + ">";
	case "closure":
		return "<closure>";
	case "channel":
		return "<channel #" + String(v.read.id) + "/#" + String(v.write.id) + ">";
	case "global":
		return "<global " + v.decl.name + ">";
	}
}
