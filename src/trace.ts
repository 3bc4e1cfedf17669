// SPDX-License-Identifier: MIT
// Session Calculus Tracing
// Diagnostic side channel: entry/exit of evaluations, channel traffic, fork outcomes

/**
 * Sink for diagnostic lines. `trace` lines are only emitted while `enabled`;
 * `warn` lines (forked-process faults) are always emitted.
 */
export interface Tracer {
	readonly enabled: boolean;
	trace(line: string): void;
	warn(line: string): void;
}

/** Tracer writing to the console's error stream */
export function consoleTracer(enabled: boolean): Tracer {
	return {
		enabled,
		trace: (line) => { console.error("[trace] " + line); },
		warn: (line) => { console.warn("[warn] " + line); },
	};
}

/**
 * Tracer that records every line, for tests and embedding.
 */
export class MemoryTracer implements Tracer {
	readonly enabled: boolean;
	readonly lines: string[] = [];
	readonly warnings: string[] = [];

	constructor(enabled = true) {
		this.enabled = enabled;
	}

	trace(line: string): void {
		this.lines.push(line);
	}

	warn(line: string): void {
		this.warnings.push(line);
	}
}

/**
 * Whether the environment asks for tracing (`SESSION_TRACE=1` or `true`).
 */
export function traceFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
	const flag = env["SESSION_TRACE"];
	return flag === "1" || flag === "true";
}
