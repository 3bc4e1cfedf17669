// SPDX-License-Identifier: MIT
// Session Calculus - big-step evaluator with session channels
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Expr, ExprKind, FunctionDecl, TypeDecl, Declaration, Program, Param,
	Value, UnitVal, LabelVal, IntVal, PairVal, ClosureVal, ChannelVal, GlobalVal,
} from "./types.js";

export type { ValueEnv } from "./env.js";

export type { ErrorCode, ValidationError, ValidationResult } from "./errors.js";

export type { EvalContext, EvalOptions } from "./evaluator.js";

export type { TaskScheduler, SchedulerOptions } from "./scheduler.js";

export type { Tracer } from "./trace.js";

//==============================================================================
// Value Constructors, Guards and Rendering
//==============================================================================

export {
	unitVal, labelVal, intVal, pairVal, closureVal, channelVal, globalVal,
	isUnit, isLabel, isInt, isPair, isClosure, isChannel, isGlobal,
	formatValue,
} from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export { ErrorCodes, SessionError, isSessionError } from "./errors.js";

//==============================================================================
// Environment Functions
//==============================================================================

export {
	emptyValueEnv, extendValueEnv, extendValueEnvMany, lookupValue, globalEnv,
} from "./env.js";

//==============================================================================
// Validation
//==============================================================================

export { validateProgram } from "./validator.js";
export { ProgramSchema, ExprSchema, DeclarationSchema } from "./zod-schemas.js";

//==============================================================================
// Evaluation
//==============================================================================

export { Evaluator, createEvaluator } from "./evaluator.js";
export { interpret, runProgram, MAIN } from "./interpret.js";

//==============================================================================
// Runtime
//==============================================================================

export { ChannelQueue, ChannelStore, createChannelStore } from "./async-effects.js";
export { DefaultTaskScheduler, createTaskScheduler } from "./scheduler.js";
export { MemoryTracer, consoleTracer, traceFromEnv } from "./trace.js";
