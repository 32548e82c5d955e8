/**
 * LookaheadBuffer for iterlane - bounded peek buffering
 */

import createDebug from "debug";
import { assertInteger } from "./config.js";
import { ExhaustedError, InvalidArgumentError } from "./errors.js";
import { toSource } from "./source.js";
import type { SequenceSource, SourceInput } from "./types.js";

const debugLookahead = createDebug("iterlane:lookahead");

/**
 * A bounded ring buffer in front of a source.
 *
 * Elements are pulled one at a time and only when a caller asks to see
 * them, so the buffer never runs ahead of the deepest peek requested. The
 * buffer owns its source from construction on.
 *
 * @example
 * ```typescript
 * const buf = lookahead(tokens(), 2)
 *
 * if (buf.peek(0) === "(" && buf.peek(1) === ")") {
 *   buf.consume(2)
 * }
 * ```
 */
export class LookaheadBuffer<T> implements IterableIterator<T> {
	private readonly source: SequenceSource<T>;
	private readonly slots: T[];
	private head = 0; // Slot of the first unconsumed element
	private size = 0;
	private pulledCount = 0;
	private consumedCount = 0;
	private done = false;

	constructor(
		source: SourceInput<T>,
		readonly capacity: number,
	) {
		assertInteger("capacity", capacity, 1);
		this.source = toSource(source);
		this.slots = new Array<T>(capacity);
	}

	/** Elements currently buffered */
	get length(): number {
		return this.size;
	}

	/** Elements ever pulled from the source */
	get pulled(): number {
		return this.pulledCount;
	}

	/** Elements consumed through this buffer */
	get consumed(): number {
		return this.consumedCount;
	}

	/** Whether the source has reported exhaustion */
	get exhausted(): boolean {
		return this.done;
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this;
	}

	/**
	 * Return the element `n` positions past the read position without
	 * consuming it. Throws ExhaustedError when fewer than `n + 1` remain.
	 */
	peek(n = 0): T {
		this.assertDepth(n);
		if (!this.fill(n + 1)) {
			throw new ExhaustedError(n + 1, this.size);
		}
		return this.slot(n);
	}

	/**
	 * Like peek, but reports exhaustion as `done` instead of throwing.
	 */
	tryPeek(n = 0): IteratorResult<T, undefined> {
		this.assertDepth(n);
		if (!this.fill(n + 1)) {
			return { done: true, value: undefined };
		}
		return { done: false, value: this.slot(n) };
	}

	/**
	 * Discard the first `n` unconsumed elements.
	 */
	consume(n = 1): void {
		assertInteger("consume count", n, 0);
		if (n > this.capacity) {
			throw new InvalidArgumentError(
				`Cannot consume ${n} element(s) from a buffer of capacity ${this.capacity}`,
			);
		}
		if (!this.fill(n)) {
			throw new ExhaustedError(n, this.size);
		}
		this.drop(n);
	}

	/**
	 * Buffer one more element.
	 * Returns false when the buffer is full or the source is exhausted.
	 */
	tryPull(): boolean {
		if (this.size >= this.capacity) return false;
		return this.pullOne();
	}

	/**
	 * Consume and return the next element.
	 */
	next(): IteratorResult<T, undefined> {
		if (!this.fill(1)) {
			return { done: true, value: undefined };
		}
		const value = this.slot(0);
		this.drop(1);
		return { done: false, value };
	}

	/**
	 * Discard up to `n` elements, buffered ones first and then straight from
	 * the source without buffering them. Returns how many were discarded.
	 */
	skip(n: number): number {
		assertInteger("skip count", n, 0);
		const fromBuffer = Math.min(n, this.size);
		this.drop(fromBuffer);

		let skipped = fromBuffer;
		while (skipped < n && this.pullFromSource()) {
			skipped++;
			this.consumedCount++;
		}
		return skipped;
	}

	private assertDepth(n: number): void {
		assertInteger("peek depth", n, 0);
		if (n >= this.capacity) {
			throw new InvalidArgumentError(
				`Peek depth ${n} exceeds lookahead capacity ${this.capacity}`,
			);
		}
	}

	private slot(offset: number): T {
		return this.slots[(this.head + offset) % this.capacity];
	}

	/**
	 * Pull until `count` elements are buffered. False if the source ran dry.
	 */
	private fill(count: number): boolean {
		while (this.size < count) {
			if (!this.pullOne()) return false;
		}
		return true;
	}

	private pullOne(): boolean {
		const tail = (this.head + this.size) % this.capacity;
		const buffered = this.pullFromSource((value) => {
			this.slots[tail] = value;
		});
		if (buffered) this.size++;
		return buffered;
	}

	/**
	 * Ask the source for one element. Never asks again once it reported
	 * exhaustion; producer errors propagate unchanged.
	 */
	private pullFromSource(store?: (value: T) => void): boolean {
		if (this.done) return false;
		const result = this.source.next();
		if (result.done) {
			this.done = true;
			debugLookahead("source exhausted after %d pull(s)", this.pulledCount);
			return false;
		}
		this.pulledCount++;
		store?.(result.value);
		return true;
	}

	private drop(n: number): void {
		for (let i = 0; i < n; i++) {
			delete this.slots[(this.head + i) % this.capacity];
		}
		this.head = (this.head + n) % this.capacity;
		this.size -= n;
		this.consumedCount += n;
	}
}

/**
 * Wrap a source in a LookaheadBuffer able to see `capacity` elements ahead.
 */
export function lookahead<T>(
	source: SourceInput<T>,
	capacity: number,
): LookaheadBuffer<T> {
	return new LookaheadBuffer(source, capacity);
}
