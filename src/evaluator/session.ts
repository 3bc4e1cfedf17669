// SPDX-License-Identifier: MIT
// Session channel and concurrency handlers: new, send, recv, fork

import type { ValueEnv } from "../env.js";
import {
	type ForkExpr,
	type RecvExpr,
	type SendExpr,
	type Value,
	closureVal,
	formatValue,
	pairVal,
	unitVal,
} from "../types.js";
import { expectChannel } from "./helpers.js";
import type { EvalContext } from "./types.js";

//==============================================================================
// New
//==============================================================================

export function evalNew(ctx: EvalContext): Value {
	return ctx.channels.createPair();
}

//==============================================================================
// Send
//==============================================================================

/**
 * Evaluate the channel and return a closure that enqueues its argument.
 * The closure hands back the same endpoint so sends and receives chain.
 */
export async function evalSend(
	expr: SendExpr,
	env: ValueEnv,
	ctx: EvalContext,
): Promise<Value> {
	const channel = expectChannel(await ctx.svc.evalExpr(expr.channel, env, ctx), "send");
	return closureVal((payload) => {
		if (ctx.tracer.enabled) {
			ctx.tracer.trace(`send ${formatValue(payload)} on ${formatValue(channel)}`);
		}
		channel.write.send(payload);
		return Promise.resolve(channel);
	});
}

//==============================================================================
// Recv
//==============================================================================

export async function evalRecv(
	expr: RecvExpr,
	env: ValueEnv,
	ctx: EvalContext,
): Promise<Value> {
	const channel = expectChannel(await ctx.svc.evalExpr(expr.channel, env, ctx), "recv");
	const value = await channel.read.recv();
	if (ctx.tracer.enabled) {
		ctx.tracer.trace(`recv ${formatValue(value)} from ${formatValue(channel)}`);
	}
	return pairVal(value, channel);
}

//==============================================================================
// Fork
//==============================================================================

/**
 * Start `expr` as an independent process over the current environment and
 * return unit without waiting for it.
 */
export function evalFork(
	expr: ForkExpr,
	env: ValueEnv,
	ctx: EvalContext,
): Value {
	const taskId = ctx.scheduler.nextTaskId();
	ctx.scheduler.spawn(taskId, () => ctx.svc.evalExpr(expr.expr, env, ctx));
	return unitVal();
}
