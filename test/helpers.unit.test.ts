// SPDX-License-Identifier: MIT
// Session Calculus Evaluator Helpers - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createChannelStore } from "../src/async-effects.js";
import { emptyValueEnv } from "../src/env.js";
import { Evaluator } from "../src/evaluator.js";
import { applyBinaryOp, arithOps, evalNatRec, expectInt } from "../src/evaluator/helpers.js";
import type { EvalContext } from "../src/evaluator/types.js";
import { createTaskScheduler } from "../src/scheduler.js";
import { MemoryTracer } from "../src/trace.js";
import { type Expr, intVal, labelVal } from "../src/types.js";
import { int, lab, plus, v } from "./ast.js";

//==============================================================================
// Test Fixtures
//==============================================================================

/** Context whose evaluator records the kind of every expression it evaluates */
function recordingContext(): { ctx: EvalContext; seen: string[] } {
	const evaluator = new Evaluator();
	const seen: string[] = [];
	const ctx: EvalContext = {
		scheduler: createTaskScheduler(),
		channels: createChannelStore(),
		tracer: new MemoryTracer(false),
		svc: {
			evalExpr: (expr: Expr, env, context) => {
				seen.push(expr.kind === "int" ? `int ${String(expr.value)}` : expr.kind);
				return evaluator.evalExpr(expr, env, context);
			},
		},
	};
	return { ctx, seen };
}

//==============================================================================
// Test Suite
//==============================================================================

describe("arithOps", () => {
	it("implements the four operators on bigints", () => {
		assert.equal(arithOps.plus(2n, 3n), 5n);
		assert.equal(arithOps.minus(2n, 3n), -1n);
		assert.equal(arithOps.times(2n, 3n), 6n);
		assert.equal(arithOps.div(-9n, 4n), -2n);
	});

	it("div throws DivisionByZero", () => {
		assert.throws(() => arithOps.div(1n, 0n), { code: "DivisionByZero" });
	});
});

describe("expectInt", () => {
	it("unwraps integers and rejects other variants", () => {
		assert.equal(expectInt(intVal(3), "test"), 3n);
		assert.throws(() => expectInt(labelVal("X"), "test"), {
			code: "TypeMismatch",
			message: "Type mismatch (test): expected int, got label 'X",
		});
	});
});

describe("applyBinaryOp", () => {
	it("evaluates both operands strictly left to right", async () => {
		const { ctx, seen } = recordingContext();
		const result = await applyBinaryOp(arithOps.minus, int(10), int(4), emptyValueEnv(), ctx);
		assert.deepEqual(result, intVal(6));
		assert.deepEqual(seen, ["int 10", "int 4"]);
	});

	it("evaluates the right operand even when it will fault later", async () => {
		const { ctx, seen } = recordingContext();
		await assert.rejects(
			applyBinaryOp(arithOps.div, int(1), int(0), emptyValueEnv(), ctx),
			{ code: "DivisionByZero" },
		);
		assert.deepEqual(seen, ["int 1", "int 0"]);
	});

	it("stops at the first non-integer operand", async () => {
		const { ctx, seen } = recordingContext();
		await assert.rejects(
			applyBinaryOp(arithOps.plus, lab("A"), int(1), emptyValueEnv(), ctx),
			{ code: "TypeMismatch" },
		);
		assert.deepEqual(seen, ["label"]);
	});
});

describe("evalNatRec", () => {
	it("evaluates the zero case first, then the step for each index", async () => {
		const { ctx, seen } = recordingContext();
		const result = await evalNatRec(
			{ kind: "natRec", index: int(2), zero: int(0), counter: "i", acc: "acc", step: plus(v("i"), v("acc")) },
			emptyValueEnv(),
			ctx,
		);
		assert.deepEqual(result, intVal(3));
		assert.deepEqual(seen, ["int 2", "int 0", "plus", "var", "var", "plus", "var", "var"]);
	});

	it("binds the counter over the accumulator when the names coincide", async () => {
		const { ctx } = recordingContext();
		const result = await evalNatRec(
			{ kind: "natRec", index: int(3), zero: int(100), counter: "x", acc: "x", step: v("x") },
			emptyValueEnv(),
			ctx,
		);
		assert.deepEqual(result, intVal(3));
	});
});
