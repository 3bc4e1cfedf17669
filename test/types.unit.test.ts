// SPDX-License-Identifier: MIT
// Session Calculus Values - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ChannelQueue } from "../src/async-effects.js";
import {
	channelVal,
	closureVal,
	formatValue,
	globalVal,
	intVal,
	isChannel,
	isClosure,
	isGlobal,
	isInt,
	isLabel,
	isPair,
	isUnit,
	labelVal,
	pairVal,
	unitVal,
} from "../src/types.js";
import { fun, unit } from "./ast.js";

describe("Value constructors", () => {
	it("intVal accepts numbers and bigints", () => {
		assert.deepEqual(intVal(5), { kind: "int", value: 5n });
		assert.deepEqual(intVal(5n), { kind: "int", value: 5n });
	});

	it("pairVal keeps both components", () => {
		assert.deepEqual(pairVal(unitVal(), labelVal("A")), {
			kind: "pair",
			first: { kind: "unit" },
			second: { kind: "label", name: "A" },
		});
	});
});

describe("Type guards", () => {
	it("recognise each variant", () => {
		const queue = new ChannelQueue(0);
		assert.ok(isUnit(unitVal()));
		assert.ok(isLabel(labelVal("A")));
		assert.ok(isInt(intVal(1)));
		assert.ok(isPair(pairVal(unitVal(), unitVal())));
		assert.ok(isClosure(closureVal(async (x) => x)));
		assert.ok(isChannel(channelVal(queue, queue)));
		assert.ok(isGlobal(globalVal(fun("main", [], unit))));
		assert.equal(isInt(labelVal("A")), false);
		assert.deepEqual(Object.keys(closureVal(async (x) => x)), ["kind", "apply"]);
	});
});

describe("formatValue", () => {
	it("renders scalars", () => {
		assert.equal(formatValue(unitVal()), "()");
		assert.equal(formatValue(labelVal("Ok")), "'Ok");
		assert.equal(formatValue(intVal(-12)), "-12");
	});

	it("renders big integers exactly", () => {
		assert.equal(formatValue(intVal(2n ** 70n)), "1180591620717411303424");
	});

	it("renders nested pairs", () => {
		assert.equal(
			formatValue(pairVal(intVal(5), pairVal(labelVal("Ok"), unitVal()))),
			"<5, <'Ok, ()>>",
		);
	});

	it("renders opaque values", () => {
		assert.equal(formatValue(closureVal(async (x) => x)), "<closure>");
		assert.equal(formatValue(channelVal(new ChannelQueue(3), new ChannelQueue(4))), "<channel #3/#4>");
		assert.equal(formatValue(globalVal(fun("helper", ["x"], unit))), "<global helper>");
	});
});
