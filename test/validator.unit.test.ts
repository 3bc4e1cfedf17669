// SPDX-License-Identifier: MIT
// Session Calculus Program Validator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { validateProgram } from "../src/validator.js";
import { caseOf, fun, int, lab, lam, program, unit, v } from "./ast.js";

describe("validateProgram - structure", () => {
	it("accepts a well-formed program", () => {
		const doc = program(fun("main", [], int(1)));
		const result = validateProgram(doc);
		assert.equal(result.valid, true);
		assert.deepEqual(result.errors, []);
		assert.equal(result.value?.declarations[0]?.name, "main");
	});

	it("accepts type declarations and annotations", () => {
		const result = validateProgram({
			declarations: [
				{ kind: "type", name: "Proto", definition: { op: "!", payload: "Int" } },
				{
					kind: "fun",
					name: "main",
					params: [],
					resultType: "Int",
					body: {
						kind: "lambda",
						param: "x",
						multiplicity: "unrestricted",
						paramType: "Int",
						body: { kind: "new", sessionType: { op: "?" } },
					},
				},
			],
		});
		assert.equal(result.valid, true);
	});

	it("accepts integer literals written as decimal strings", () => {
		const result = validateProgram(program(fun("main", [], int("123456789012345678901234567890"))));
		assert.equal(result.valid, true);
	});

	it("rejects a document without declarations", () => {
		const result = validateProgram({});
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.path, "declarations");
	});

	it("rejects an unknown expression kind", () => {
		const result = validateProgram({
			declarations: [{ kind: "fun", name: "main", params: [], body: { kind: "loop" } }],
		});
		assert.equal(result.valid, false);
		assert.equal(result.value, undefined);
	});

	it("rejects a non-integer literal", () => {
		const result = validateProgram(program(fun("main", [], int(1.5))));
		assert.equal(result.valid, false);
	});

	it("rejects a malformed integer string", () => {
		const result = validateProgram(program(fun("main", [], int("12a"))));
		assert.equal(result.valid, false);
	});

	it("rejects an empty identifier", () => {
		const result = validateProgram(program(fun("main", [], v(""))));
		assert.equal(result.valid, false);
	});
});

describe("validateProgram - semantics", () => {
	it("reports duplicate parameter names", () => {
		const result = validateProgram(program(fun("f", ["x", "y", "x"], unit)));
		assert.equal(result.valid, false);
		assert.deepEqual(result.errors, [
			{ path: "declarations.0.params.2.name", message: "Duplicate parameter name in f: x" },
		]);
	});

	it("reports duplicate case labels with the path to the branch", () => {
		const body = lam("x", {
			kind: "case",
			scrutinee: v("x"),
			branches: [
				{ label: "A", body: int(1) },
				{ label: "B", body: int(2) },
				{ label: "A", body: int(3) },
			],
		});
		const result = validateProgram(program(fun("main", [], unit), fun("g", [], body)));
		assert.deepEqual(result.errors, [
			{ path: "declarations.1.body.body.branches.2.label", message: "Duplicate case label: A" },
		]);
	});

	it("accepts distinct case labels", () => {
		const result = validateProgram(program(fun("main", [], caseOf(lab("A"), { A: int(1), B: int(2) }))));
		assert.equal(result.valid, true);
	});
});
