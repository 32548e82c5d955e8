/**
 * withFiltered for iterlane - transform the successes of a Result source,
 * keep the failures in place
 */

import { isFailure, success } from "./result.js";
import { toSource } from "./source.js";
import type {
	Failure,
	Result,
	SequenceSource,
	SourceInput,
} from "./types.js";

/**
 * Yields only the success values, handing every failure it passes over to
 * `park`.
 */
class SuccessSource<E, T> implements IterableIterator<T> {
	constructor(
		private readonly source: SequenceSource<Result<E, T>>,
		private readonly park: (failure: Failure<E>) => void,
	) {}

	[Symbol.iterator](): IterableIterator<T> {
		return this;
	}

	next(): IteratorResult<T, undefined> {
		while (true) {
			const result = this.source.next();
			if (result.done) return { done: true, value: undefined };
			const item = result.value;
			if (!isFailure(item)) return { done: false, value: item[1] };
			this.park(item);
		}
	}
}

/**
 * Re-interleaves parked failures with the pipeline's output in the order
 * they were produced.
 */
class RecombinedSource<E, U> implements IterableIterator<Result<E, U>> {
	private pending: Result<E, U>[] = [];
	private pendingHead = 0; // Index of first queued item (avoids O(n) shift)
	private pipeline: SequenceSource<U> | undefined;

	[Symbol.iterator](): IterableIterator<Result<E, U>> {
		return this;
	}

	attach(pipeline: SequenceSource<U>): void {
		this.pipeline = pipeline;
	}

	park(item: Result<E, U>): void {
		this.pending.push(item);
	}

	next(): IteratorResult<Result<E, U>, undefined> {
		const queued = this.shift();
		if (queued) return { done: false, value: queued };
		if (!this.pipeline) return { done: true, value: undefined };

		const output = this.pipeline.next();
		if (output.done) {
			// Failures after the last success surface once the pipeline ends
			const trailing = this.shift();
			return trailing
				? { done: false, value: trailing }
				: { done: true, value: undefined };
		}

		const item = success(output.value);
		if (this.pendingHead < this.pending.length) {
			this.pending.push(item);
			return { done: false, value: this.shift() ?? item };
		}
		return { done: false, value: item };
	}

	private shift(): Result<E, U> | undefined {
		if (this.pendingHead >= this.pending.length) return undefined;
		const item = this.pending[this.pendingHead++];
		if (this.pendingHead === this.pending.length) {
			this.pending = [];
			this.pendingHead = 0;
		}
		return item;
	}
}

/**
 * Run an ordinary iterator pipeline over the success values of a Result
 * source, then merge the failures back into its output.
 *
 * Failures met while the pipeline was fetching an input come out before
 * the output produced from that input. Only failures still waiting to be
 * emitted are buffered.
 *
 * @example
 * ```typescript
 * const results = withFiltered(parsedRows, (rows) =>
 *   seq(rows).filter(row => row.active).map(row => row.id),
 * )
 * for (const [err, id] of results) {
 *   if (err) report(err)
 *   else keep(id)
 * }
 * ```
 */
export function withFiltered<E, T, U>(
	source: SourceInput<Result<E, T>>,
	fn: (values: IterableIterator<T>) => SourceInput<U>,
): IterableIterator<Result<E, U>> {
	const recombined = new RecombinedSource<E, U>();
	const successes = new SuccessSource<E, T>(toSource(source), (failure) =>
		recombined.park(failure),
	);
	recombined.attach(toSource(fn(successes)));
	return recombined;
}
