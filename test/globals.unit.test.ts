// SPDX-License-Identifier: MIT
// Session Calculus Global Declaration Resolver - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { globalEnv } from "../src/env.js";
import { Evaluator } from "../src/evaluator.js";
import { MemoryTracer } from "../src/trace.js";
import { intVal, isChannel, isClosure, type Value } from "../src/types.js";
import { app, fun, int, lam, let_, minus, newChan, pair, plus, v } from "./ast.js";

function channelIds(value: Value): number[] {
	if (value.kind !== "pair" || !isChannel(value.first) || !isChannel(value.second)) {
		throw new Error("expected a channel pair");
	}
	return [value.first.read.id, value.first.write.id, value.second.read.id, value.second.write.id];
}

describe("Global declaration resolver", () => {
	it("resolves a zero-parameter declaration to its body's value", async () => {
		const answer = fun("answer", [], plus(int(40), int(2)));
		const evaluator = new Evaluator(globalEnv([answer]));
		assert.deepEqual(await evaluator.resolve(answer), intVal(42));
	});

	it("curries an N-parameter declaration into chained closures", async () => {
		const sub = fun("sub", ["a", "b"], minus(v("a"), v("b")));
		const evaluator = new Evaluator(globalEnv([sub]));

		assert.ok(isClosure(await evaluator.resolve(sub)));
		assert.ok(isClosure(await evaluator.evaluate(app(v("sub"), int(10)))));
		assert.deepEqual(await evaluator.evaluate(app(v("sub"), int(10), int(3))), intVal(7));
	});

	it("lets declarations refer to each other", async () => {
		const double = fun("double", ["x"], plus(v("x"), v("x")));
		const quad = fun("quad", ["x"], app(v("double"), app(v("double"), v("x"))));
		const evaluator = new Evaluator(globalEnv([double, quad]));
		assert.deepEqual(await evaluator.evaluate(app(v("quad"), int(3))), intVal(12));
	});

	it("re-evaluates the body at every reference", async () => {
		const chan = fun("chan", [], newChan);
		const evaluator = new Evaluator(globalEnv([chan]));
		const result = await evaluator.evaluate(pair("_", v("chan"), v("chan")));
		if (result.kind !== "pair") throw new Error("expected a pair");

		assert.deepEqual(channelIds(result.first), [0, 1, 1, 0]);
		assert.deepEqual(channelIds(result.second), [2, 3, 3, 2]);
	});

	it("does not cache a global value between references", async () => {
		const costly = fun("costly", [], plus(int(1), int(1)));
		const evaluator = new Evaluator(globalEnv([costly]));
		const tracer = new MemoryTracer();
		await evaluator.evaluate(pair("_", v("costly"), v("costly")), undefined, { tracer });
		assert.equal(tracer.lines.filter((line) => line === "enter plus").length, 2);
	});

	it("shares nothing between partial applications", async () => {
		const add = fun("add", ["a", "b"], plus(v("a"), v("b")));
		const evaluator = new Evaluator(globalEnv([add]));
		const expr = let_("inc", app(v("add"), int(1)),
			let_("dec", app(v("add"), int(-1)),
				pair("_", app(v("inc"), int(10)), app(v("dec"), int(10)))));
		const result = await evaluator.evaluate(expr);
		assert.deepEqual(result, { kind: "pair", first: intVal(11), second: intVal(9) });
	});

	it("evaluates the body in the scope of the reference", async () => {
		const peek = fun("peek", [], v("y"));
		const y = fun("y", [], int(1));
		const evaluator = new Evaluator(globalEnv([peek, y]));
		assert.deepEqual(await evaluator.evaluate(let_("y", int(7), v("peek"))), intVal(7));
		assert.deepEqual(await evaluator.evaluate(v("peek")), intVal(1));
	});

	it("captures the referencing scope in a curried chain", async () => {
		const offset = fun("offset", ["a"], plus(v("a"), v("base")));
		const evaluator = new Evaluator(globalEnv([offset]));
		const expr = let_("base", int(100), app(v("offset"), int(5)));
		assert.deepEqual(await evaluator.evaluate(expr), intVal(105));
	});

	it("fails on a free name the reference does not bind", async () => {
		const peek = fun("peek", [], v("x"));
		const evaluator = new Evaluator(globalEnv([peek]));
		await assert.rejects(evaluator.evaluate(v("peek")), { code: "UnboundVariable" });
	});

	it("lambda arguments are values, not re-evaluated globals", async () => {
		const costly = fun("costly", [], plus(int(1), int(1)));
		const evaluator = new Evaluator(globalEnv([costly]));
		const tracer = new MemoryTracer();
		const twice = lam("x", plus(v("x"), v("x")));
		assert.deepEqual(await evaluator.evaluate(app(twice, v("costly")), undefined, { tracer }), intVal(4));
		assert.equal(tracer.lines.filter((line) => line === "enter plus").length, 2);
	});
});
