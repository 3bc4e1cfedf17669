// SPDX-License-Identifier: MIT
// Shared types and interfaces for the evaluator subsystem

import type { ChannelStore } from "../async-effects.js";
import type { ValueEnv } from "../env.js";
import type { TaskScheduler } from "../scheduler.js";
import type { Tracer } from "../trace.js";
import type { Expr, Value } from "../types.js";

//==============================================================================
// Evaluation Options
//==============================================================================

export interface EvalOptions {
	/** Emit entry/exit and channel trace lines (ignored when `tracer` is given) */
	trace?: boolean;
	tracer?: Tracer;
	/** Step limit across all processes; unlimited by default */
	maxSteps?: number;
	/** Yield to the event loop every N steps */
	yieldInterval?: number;
	scheduler?: TaskScheduler;
	channels?: ChannelStore;
}

//==============================================================================
// Evaluation Context (shared by the main process and every fork)
//==============================================================================

export interface EvalContext {
	readonly scheduler: TaskScheduler;
	readonly channels: ChannelStore;
	readonly tracer: Tracer;
	readonly svc: EvalServices;
}

//==============================================================================
// Evaluator Services (injected dependencies from the class)
//==============================================================================

export interface EvalServices {
	evalExpr: (
		expr: Expr,
		env: ValueEnv,
		context: EvalContext,
	) => Promise<Value>;
}
