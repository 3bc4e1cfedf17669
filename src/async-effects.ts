// SPDX-License-Identifier: MIT
// Session Calculus Async Effects
// Async runtime primitives for session channels
// Provides ChannelQueue and the ChannelStore that allocates cross-wired pairs

import { channelVal, pairVal, type ChannelVal, type PairVal, type Value } from "./types.js";

//==============================================================================
// Channel Queue (unbounded FIFO with blocking receive)
//==============================================================================

type QueueRecvResolver = (value: Value) => void;

/**
 * ChannelQueue is one direction of a session channel.
 * Sends never block; receives suspend until a value is available.
 * Values are delivered in the order they were sent, and waiting receivers
 * are served in the order they started waiting.
 */
export class ChannelQueue {
	readonly id: number;
	private buffer: Value[] = [];
	private waitingReceivers: QueueRecvResolver[] = [];

	constructor(id: number) {
		this.id = id;
	}

	/**
	 * Enqueue a value, handing it straight to the oldest waiting receiver if any
	 * @param value - Value to send
	 */
	send(value: Value): void {
		const receiver = this.waitingReceivers.shift();
		if (receiver) {
			receiver(value);
			return;
		}
		this.buffer.push(value);
	}

	/**
	 * Dequeue the next value
	 * @returns Promise that resolves once a value has been sent
	 */
	recv(): Promise<Value> {
		const buffered = this.tryRecv();
		if (buffered !== undefined) return Promise.resolve(buffered);

		return new Promise<Value>((resolve) => {
			this.waitingReceivers.push(resolve);
		});
	}

	/**
	 * Try to receive without blocking
	 * @returns Received value or undefined if the queue is empty
	 */
	tryRecv(): Value | undefined {
		return this.buffer.shift();
	}

	/** Number of buffered values */
	size(): number {
		return this.buffer.length;
	}

	/** Number of receivers suspended on this queue */
	waiting(): number {
		return this.waitingReceivers.length;
	}
}

//==============================================================================
// Channel Store (allocates queue ids and channel pairs)
//==============================================================================

/**
 * ChannelStore hands out fresh queues. It holds no reference to them:
 * a queue lives exactly as long as some endpoint refers to it.
 */
export class ChannelStore {
	private nextId = 0;

	/** Allocate a single queue */
	createQueue(): ChannelQueue {
		return new ChannelQueue(this.nextId++);
	}

	/**
	 * Allocate two queues and cross-wire them into a pair of endpoints:
	 * each endpoint's write queue is the other's read queue.
	 */
	createPair(): PairVal {
		const r = this.createQueue();
		const w = this.createQueue();
		const left: ChannelVal = channelVal(r, w);
		const right: ChannelVal = channelVal(w, r);
		return pairVal(left, right);
	}

	/** Number of queues allocated so far */
	size(): number {
		return this.nextId;
	}
}

//==============================================================================
// Factory Functions
//==============================================================================

/** Create a channel store */
export function createChannelStore(): ChannelStore { return new ChannelStore(); }
