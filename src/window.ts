/**
 * WindowEngine for iterlane - fixed and sliding windows
 */

import createDebug from "debug";
import { type ResolvedWindowOptions, resolveWindowOptions } from "./config.js";
import { LookaheadBuffer } from "./lookahead.js";
import type { SourceInput, Window, WindowOptions } from "./types.js";

const debugWindow = createDebug("iterlane:window");

/**
 * Yields windows of `size` consecutive elements, advancing `stride`
 * elements between windows.
 *
 * - `stride < size` overlaps windows (default stride is 1)
 * - `stride === size` tiles the input
 * - `stride > size` skips `stride - size` elements between windows
 *
 * An incomplete trailing window is dropped by default. With
 * `tailPolicy: "emitPartial"` it is emitted shorter than `size`, and with
 * `{ emitPadded: fill }` it is padded to `size`. A trailing window is only
 * emitted when it holds an element no earlier window covered.
 *
 * Every window is a frozen copy, unaffected by later buffer movement.
 *
 * @example
 * ```typescript
 * windows([1, 2, 3, 4, 5], { size: 3 })             // [1,2,3] [2,3,4] [3,4,5]
 * windows([1, 2, 3, 4, 5], { size: 2, stride: 2 })  // [1,2] [3,4]
 * ```
 */
export class WindowEngine<T> implements IterableIterator<Window<T>> {
	private readonly buffer: LookaheadBuffer<T>;
	private readonly options: ResolvedWindowOptions<T>;
	private coveredUntil = 0; // Absolute position one past the last emitted element
	private pendingSkip = 0;
	private emitted = 0;
	private done = false;

	constructor(source: SourceInput<T>, options: WindowOptions<T>) {
		this.options = resolveWindowOptions(options);
		this.buffer = new LookaheadBuffer(source, this.options.size);
	}

	[Symbol.iterator](): IterableIterator<Window<T>> {
		return this;
	}

	next(): IteratorResult<Window<T>, undefined> {
		if (this.done) return { done: true, value: undefined };

		const { size, stride } = this.options;
		// pendingSkip always holds the number still to skip
		while (this.pendingSkip > 0) {
			if (this.buffer.skip(1) === 0) {
				this.pendingSkip = 0;
				break;
			}
			this.pendingSkip--;
		}
		const available = this.fill();
		const start = this.buffer.consumed;

		if (available === size) {
			const window = Object.freeze(this.snapshot(size));
			this.coveredUntil = start + size;
			this.pendingSkip = stride;
			this.emitted++;
			return { done: false, value: window };
		}

		this.done = true;
		const tail = this.tail(available, start);
		debugWindow("finished after %d window(s)", this.emitted);
		if (!tail) return { done: true, value: undefined };
		this.emitted++;
		return { done: false, value: tail };
	}

	/**
	 * Buffer up to `size` elements; returns how many are available.
	 */
	private fill(): number {
		let available = 0;
		while (
			available < this.options.size &&
			!this.buffer.tryPeek(available).done
		) {
			available++;
		}
		return available;
	}

	private snapshot(count: number): T[] {
		const items: T[] = [];
		for (let i = 0; i < count; i++) {
			items.push(this.buffer.peek(i));
		}
		return items;
	}

	private tail(available: number, start: number): Window<T> | undefined {
		if (available === 0 || start + available <= this.coveredUntil) {
			return undefined;
		}

		const { tailPolicy, size, logger } = this.options;
		if (tailPolicy === "drop") {
			logger.debug(`dropped trailing window of ${available} element(s)`);
			return undefined;
		}

		const items = this.snapshot(available);
		this.buffer.consume(available);
		if (typeof tailPolicy === "object") {
			while (items.length < size) {
				items.push(tailPolicy.emitPadded);
			}
		}
		return Object.freeze(items);
	}
}

/**
 * Slide or tile windows over `source`.
 */
export function windows<T>(
	source: SourceInput<T>,
	options: WindowOptions<T>,
): WindowEngine<T> {
	return new WindowEngine(source, options);
}

/**
 * Split `source` into consecutive chunks of `size`; the last chunk may be
 * shorter.
 */
export function chunks<T>(
	source: SourceInput<T>,
	size: number,
): WindowEngine<T> {
	return new WindowEngine(source, {
		size,
		stride: size,
		tailPolicy: "emitPartial",
	});
}
