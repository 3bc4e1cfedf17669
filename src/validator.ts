// SPDX-License-Identifier: MIT
// Session Calculus Program Validator
// Two-phase validation: Zod safeParse for structural, then semantic checks.

import { z } from "zod/v4";
import {
	exhaustive,
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import type { Expr, FunctionDecl, Program } from "./types.js";
import { ProgramSchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function addError(state: ValidationState, message: string): void {
	state.errors.push({ path: currentPath(state), message });
}

function withPath(state: ValidationState, segments: string[], fn: () => void): void {
	state.path.push(...segments);
	try {
		fn();
	} finally {
		state.path.length -= segments.length;
	}
}

//==============================================================================
// Expression traversal
//==============================================================================

/** Direct sub-expressions with the path segments leading to them */
function childExprs(expr: Expr): [string[], Expr][] {
	switch (expr.kind) {
	case "unit":
	case "var":
	case "label":
	case "int":
	case "nat":
	case "new":
		return [];
	case "plus":
	case "minus":
	case "times":
	case "div":
		return [[["left"], expr.left], [["right"], expr.right]];
	case "negate":
	case "succ":
	case "fst":
	case "snd":
	case "fork":
		return [[["expr"], expr.expr]];
	case "let":
	case "letPair":
		return [[["value"], expr.value], [["body"], expr.body]];
	case "pair":
		return [[["first"], expr.first], [["second"], expr.second]];
	case "lambda":
		return [[["body"], expr.body]];
	case "app":
		return [[["fn"], expr.fn], [["arg"], expr.arg]];
	case "send":
	case "recv":
		return [[["channel"], expr.channel]];
	case "case":
		return [
			[["scrutinee"], expr.scrutinee],
			...expr.branches.map((b, i): [string[], Expr] => [["branches", String(i), "body"], b.body]),
		];
	case "natRec":
		return [[["index"], expr.index], [["zero"], expr.zero], [["step"], expr.step]];
	default:
		return exhaustive(expr);
	}
}

function checkCaseLabels(state: ValidationState, expr: Expr): void {
	if (expr.kind !== "case") return;
	const seen = new Set<string>();
	expr.branches.forEach((branch, i) => {
		if (seen.has(branch.label)) {
			withPath(state, ["branches", String(i), "label"], () => {
				addError(state, "Duplicate case label: " + branch.label);
			});
		}
		seen.add(branch.label);
	});
}

function checkExpr(state: ValidationState, expr: Expr): void {
	checkCaseLabels(state, expr);
	for (const [segments, child] of childExprs(expr)) {
		withPath(state, segments, () => { checkExpr(state, child); });
	}
}

//==============================================================================
// Declaration checks
//==============================================================================

function checkParams(state: ValidationState, decl: FunctionDecl): void {
	const seen = new Set<string>();
	decl.params.forEach((param, i) => {
		if (seen.has(param.name)) {
			withPath(state, ["params", String(i), "name"], () => {
				addError(state, "Duplicate parameter name in " + decl.name + ": " + param.name);
			});
		}
		seen.add(param.name);
	});
}

function semanticValidateProgram(program: Program): ValidationResult<Program> {
	const state: ValidationState = { errors: [], path: [] };

	program.declarations.forEach((decl, i) => {
		if (decl.kind !== "fun") return;
		withPath(state, ["declarations", String(i)], () => {
			checkParams(state, decl);
			withPath(state, ["body"], () => { checkExpr(state, decl.body); });
		});
	});

	if (state.errors.length > 0) {
		return invalidResult<Program>(state.errors);
	}
	return validResult(program);
}

//==============================================================================
// Public Validators
//==============================================================================

export function validateProgram(doc: unknown): ValidationResult<Program> {
	// Phase 1: Structural validation via Zod
	const parsed = ProgramSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<Program>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	return semanticValidateProgram(parsed.data);
}
