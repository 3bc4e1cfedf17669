// SPDX-License-Identifier: MIT
// Session Calculus Task Scheduler
// Cooperative, fire-and-forget process scheduling with Promise-based execution

import { SessionError } from "./errors.js";
import { consoleTracer, type Tracer } from "./trace.js";
import { formatValue, type Value } from "./types.js";

//==============================================================================
// Task Scheduler Interface
//==============================================================================

/**
 * TaskScheduler runs forked processes.
 * A spawned process is never joined by the program; its result or fault is
 * only recorded here and reported to the tracer.
 */
export interface TaskScheduler {
	/** Spawn a new process and start it eagerly */
	spawn(taskId: string, fn: () => Promise<Value>): void;
	/** Allocate a fresh id for a forked process */
	nextTaskId(): string;
	/** Count a step, enforce the step limit and yield if needed */
	checkGlobalSteps(): Promise<void>;
	/**
	 * Wait for a running process to finish (host-side only; never used by
	 * programs). A process that already failed rethrows its fault.
	 */
	await(taskId: string): Promise<Value>;
	/** Check that a process is no longer running */
	isComplete(taskId: string): boolean;
	/** Number of processes still running or blocked */
	readonly activeTaskCount: number;
	/** The global step counter */
	readonly globalSteps: number;
	/** Number of processes that have finished or failed */
	readonly settledTaskCount: number;
	/** The most recent faults raised by forked processes, by task id */
	readonly failures: ReadonlyMap<string, Error>;
}

export interface SchedulerOptions {
	/** Abort evaluation after this many steps across all processes (default: unlimited) */
	globalMaxSteps?: number;
	/** Yield to the event loop every N steps (default: 100) */
	yieldInterval?: number;
	/** Keep at most this many faults in `failures`, dropping the oldest (default: 100) */
	failureLimit?: number;
	tracer?: Tracer;
}

//==============================================================================
// Default Task Scheduler
//==============================================================================

interface Task {
	/** Resolves once the task has completed or failed; never rejects */
	settled: Promise<void>;
	result?: Value;
	error?: Error;
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

export class DefaultTaskScheduler implements TaskScheduler {
	/** Running tasks only; a task is dropped, result and all, once it settles */
	private running = new Map<string, Task>();
	private _failures = new Map<string, Error>();
	private _settledTaskCount = 0;
	private _globalSteps = 0;
	private nextForkId = 0;
	private readonly globalMaxSteps: number;
	private readonly yieldInterval: number;
	private readonly failureLimit: number;
	private readonly tracer: Tracer;

	constructor(options: SchedulerOptions = {}) {
		this.globalMaxSteps = options.globalMaxSteps ?? Number.POSITIVE_INFINITY;
		this.yieldInterval = Math.max(1, options.yieldInterval ?? 100);
		this.failureLimit = Math.max(0, options.failureLimit ?? 100);
		this.tracer = options.tracer ?? consoleTracer(false);
	}

	get activeTaskCount(): number {
		return this.running.size;
	}

	get settledTaskCount(): number {
		return this._settledTaskCount;
	}

	get globalSteps(): number {
		return this._globalSteps;
	}

	get failures(): ReadonlyMap<string, Error> {
		return this._failures;
	}

	nextTaskId(): string {
		return `fork-${this.nextForkId++}`;
	}

	spawn(taskId: string, fn: () => Promise<Value>): void {
		const task: Task = { settled: Promise.resolve() };
		this.running.set(taskId, task);

		// Eagerly start the task; nobody waits on it, so both outcomes end here
		task.settled = fn().then(
			(result) => {
				this.settle(taskId);
				task.result = result;
				if (this.tracer.enabled) {
					this.tracer.trace(`fork ${taskId} finished => ${formatValue(result)}`);
				}
			},
			(error: unknown) => {
				const err = toError(error);
				this.settle(taskId);
				task.error = err;
				this.recordFailure(taskId, err);
				this.tracer.warn(`fork ${taskId} failed: ${err.message}`);
			},
		);
	}

	private settle(taskId: string): void {
		this.running.delete(taskId);
		this._settledTaskCount++;
	}

	private recordFailure(taskId: string, error: Error): void {
		if (this.failureLimit === 0) return;
		this._failures.set(taskId, error);
		if (this._failures.size > this.failureLimit) {
			const [oldest] = this._failures.keys();
			if (oldest !== undefined) this._failures.delete(oldest);
		}
	}

	async await(taskId: string): Promise<Value> {
		const task = this.running.get(taskId);
		if (!task) {
			const failure = this._failures.get(taskId);
			if (failure) throw failure;
			throw new Error(`Task ${taskId} is not running`);
		}
		await task.settled;
		if (task.error) throw task.error;
		if (task.result === undefined) {
			throw new Error(`Task ${taskId} settled without a result`);
		}
		return task.result;
	}

	async checkGlobalSteps(): Promise<void> {
		if (++this._globalSteps > this.globalMaxSteps) {
			throw SessionError.stepLimitExceeded(this.globalMaxSteps);
		}
		if (this._globalSteps % this.yieldInterval === 0) {
			await new Promise<void>((resolve) => setImmediate(resolve));
		}
	}

	isComplete(taskId: string): boolean {
		return !this.running.has(taskId);
	}
}

//==============================================================================
// Factory Functions
//==============================================================================

/** Create a default task scheduler */
export function createTaskScheduler(options?: SchedulerOptions): TaskScheduler {
	return new DefaultTaskScheduler(options);
}
