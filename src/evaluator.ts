// SPDX-License-Identifier: MIT
// Session Calculus Evaluator
// Promise-based big-step evaluation: ρ ⊢ e ⇓ v
// A blocked receive suspends only the process that issued it

import { createChannelStore } from "./async-effects.js";
import {
	type ValueEnv,
	emptyValueEnv,
	extendValueEnv,
	extendValueEnvMany,
	lookupValue,
} from "./env.js";
import { SessionError, exhaustive } from "./errors.js";
import { createTaskScheduler } from "./scheduler.js";
import { consoleTracer } from "./trace.js";
import {
	type AppExpr,
	type CaseExpr,
	type Expr,
	type FunctionDecl,
	type LetPairExpr,
	type PairExpr,
	type Value,
	closureVal,
	formatValue,
	intVal,
	isGlobal,
	labelVal,
	pairVal,
	unitVal,
} from "./types.js";
import {
	applyBinaryOp,
	arithOps,
	evalNatRec,
	expectClosure,
	expectLabel,
	expectPair,
	intLit,
} from "./evaluator/helpers.js";
import { resolveGlobal } from "./evaluator/globals.js";
import { evalFork, evalNew, evalRecv, evalSend } from "./evaluator/session.js";
import type { EvalContext, EvalOptions, EvalServices } from "./evaluator/types.js";

export type { EvalContext, EvalOptions, EvalServices };

//==============================================================================
// Trace formatting
//==============================================================================

function describeExpr(expr: Expr): string {
	switch (expr.kind) {
	case "var":
	case "label":
		return expr.kind + " " + expr.name;
	case "int":
	case "nat":
		return expr.kind + " " + String(expr.value);
	case "let":
	case "pair":
		return expr.kind + " " + expr.name;
	case "lambda":
		return "lambda " + expr.param;
	default:
		return expr.kind;
	}
}

//==============================================================================
// Evaluator Class
//==============================================================================

export class Evaluator {
	private readonly _globals: ValueEnv;
	private readonly _svc: EvalServices;

	constructor(globals: ValueEnv = emptyValueEnv()) {
		this._globals = globals;
		this._svc = {
			evalExpr: (expr, env, ctx) => this.evalExpr(expr, env, ctx),
		};
	}

	get globals(): ValueEnv {
		return this._globals;
	}

	/**
	 * Evaluate an expression as a fresh main process.
	 * `env` defaults to the global table.
	 */
	evaluate(expr: Expr, env: ValueEnv = this._globals, options?: EvalOptions): Promise<Value> {
		return this.evalExpr(expr, env, this.buildContext(options));
	}

	/**
	 * Resolve a global declaration as a fresh main process.
	 */
	resolve(decl: FunctionDecl, options?: EvalOptions): Promise<Value> {
		return resolveGlobal(decl, this._globals, this.buildContext(options));
	}

	private buildContext(options?: EvalOptions): EvalContext {
		const tracer = options?.tracer ?? consoleTracer(options?.trace ?? false);
		const schedulerOptions = {
			tracer,
			...(options?.maxSteps !== undefined ? { globalMaxSteps: options.maxSteps } : {}),
			...(options?.yieldInterval !== undefined ? { yieldInterval: options.yieldInterval } : {}),
		};
		return {
			scheduler: options?.scheduler ?? createTaskScheduler(schedulerOptions),
			channels: options?.channels ?? createChannelStore(),
			tracer,
			svc: this._svc,
		};
	}

	// ==========================================================================
	// Expression Dispatch
	// ==========================================================================

	async evalExpr(expr: Expr, env: ValueEnv, ctx: EvalContext): Promise<Value> {
		await ctx.scheduler.checkGlobalSteps();
		if (!ctx.tracer.enabled) return this.dispatch(expr, env, ctx);

		const label = describeExpr(expr);
		ctx.tracer.trace("enter " + label);
		const value = await this.dispatch(expr, env, ctx);
		ctx.tracer.trace("leave " + label + " => " + formatValue(value));
		return value;
	}

	private dispatch(expr: Expr, env: ValueEnv, ctx: EvalContext): Promise<Value> | Value {
		switch (expr.kind) {
		case "unit": return unitVal();
		case "label": return labelVal(expr.name);
		case "int":
		case "nat": return intVal(BigInt(expr.value));
		case "var": return this.evalVar(expr.name, env, ctx);
		case "plus":
		case "minus":
		case "times":
		case "div": return applyBinaryOp(arithOps[expr.kind], expr.left, expr.right, env, ctx);
		case "negate": return applyBinaryOp(arithOps.minus, intLit(0), expr.expr, env, ctx);
		case "succ": return applyBinaryOp(arithOps.plus, intLit(1), expr.expr, env, ctx);
		case "let": return this.evalLet(expr.name, expr.value, expr.body, env, ctx);
		case "letPair": return this.evalLetPair(expr, env, ctx);
		case "pair": return this.evalPair(expr, env, ctx);
		case "fst": return this.evalProjection(expr.expr, "first", env, ctx);
		case "snd": return this.evalProjection(expr.expr, "second", env, ctx);
		case "lambda": return closureVal((arg) =>
			this.evalExpr(expr.body, extendValueEnv(env, expr.param, arg), ctx));
		case "app": return this.evalApp(expr, env, ctx);
		case "fork": return evalFork(expr, env, ctx);
		case "new": return evalNew(ctx);
		case "send": return evalSend(expr, env, ctx);
		case "recv": return evalRecv(expr, env, ctx);
		case "case": return this.evalCase(expr, env, ctx);
		case "natRec": return evalNatRec(expr, env, ctx);
		default: return exhaustive(expr);
		}
	}

	// ==========================================================================
	// Handlers
	// ==========================================================================

	/**
	 * A global is resolved at every reference, in the referencing scope;
	 * nothing is cached.
	 */
	private evalVar(name: string, env: ValueEnv, ctx: EvalContext): Promise<Value> | Value {
		const value = lookupValue(env, name);
		if (value === undefined) throw SessionError.unboundVariable(name);
		if (isGlobal(value)) return resolveGlobal(value.decl, env, ctx);
		return value;
	}

	private async evalLet(
		name: string,
		valueExpr: Expr,
		body: Expr,
		env: ValueEnv,
		ctx: EvalContext,
	): Promise<Value> {
		const value = await this.evalExpr(valueExpr, env, ctx);
		return this.evalExpr(body, extendValueEnv(env, name, value), ctx);
	}

	private async evalLetPair(expr: LetPairExpr, env: ValueEnv, ctx: EvalContext): Promise<Value> {
		const pair = expectPair(await this.evalExpr(expr.value, env, ctx), "letPair");
		// first is bound last so it wins if both names coincide
		const bodyEnv = extendValueEnvMany(env, [
			[expr.second, pair.second],
			[expr.first, pair.first],
		]);
		return this.evalExpr(expr.body, bodyEnv, ctx);
	}

	/** Dependent pair: the second component sees the first under `name` */
	private async evalPair(expr: PairExpr, env: ValueEnv, ctx: EvalContext): Promise<Value> {
		const first = await this.evalExpr(expr.first, env, ctx);
		const second = await this.evalExpr(expr.second, extendValueEnv(env, expr.name, first), ctx);
		return pairVal(first, second);
	}

	private async evalProjection(
		inner: Expr,
		component: "first" | "second",
		env: ValueEnv,
		ctx: EvalContext,
	): Promise<Value> {
		const pair = expectPair(
			await this.evalExpr(inner, env, ctx),
			component === "first" ? "fst" : "snd",
		);
		return pair[component];
	}

	/** Argument before function */
	private async evalApp(expr: AppExpr, env: ValueEnv, ctx: EvalContext): Promise<Value> {
		const arg = await this.evalExpr(expr.arg, env, ctx);
		const fn = expectClosure(await this.evalExpr(expr.fn, env, ctx), "application");
		return fn.apply(arg);
	}

	private async evalCase(expr: CaseExpr, env: ValueEnv, ctx: EvalContext): Promise<Value> {
		const label = expectLabel(await this.evalExpr(expr.scrutinee, env, ctx), "case");
		const branch = expr.branches.find((b) => b.label === label.name);
		if (!branch) {
			throw SessionError.noMatchingCase(label.name, expr.branches.map((b) => b.label));
		}
		return this.evalExpr(branch.body, env, ctx);
	}
}

//==============================================================================
// Factory Functions
//==============================================================================

export function createEvaluator(globals?: ValueEnv): Evaluator {
	return new Evaluator(globals);
}
