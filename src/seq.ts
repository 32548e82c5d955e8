/**
 * Seq class for iterlane - fluent chaining over the engines
 *
 * Wraps any source so the stateful combinators can be chained the same way
 * as the pass-through ones.
 */

import { toTypedError, type IterlaneError } from "./errors.js";
import { tryFold } from "./fold.js";
import { type Group, GroupingEngine } from "./grouping.js";
import { LookaheadBuffer } from "./lookahead.js";
import { MergeEngine } from "./merge.js";
import { toSource } from "./source.js";
import type {
	FoldOutcome,
	GroupingOptions,
	MergeOptions,
	Result,
	SequenceSource,
	SourceInput,
	StepFn,
	Window,
	WindowOptions,
} from "./types.js";
import { chunks, WindowEngine } from "./window.js";

/**
 * A group materialised by `Seq.groupArrays`.
 */
export interface GroupedItems<K, T> {
	readonly key: K;
	readonly items: T[];
}

/**
 * A lazy sequence with chainable combinators.
 *
 * @example
 * ```typescript
 * const [err, totals] = seq(orders)
 *   .groupArrays(order => order.customerId)
 *   .map(({ key, items }) => ({ key, total: sum(items) }))
 *   .toArray()
 * ```
 */
export class Seq<T> implements IterableIterator<T> {
	private readonly source: SequenceSource<T>;

	constructor(source: SourceInput<T>) {
		this.source = toSource(source);
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this;
	}

	next(): IteratorResult<T, unknown> {
		return this.source.next();
	}

	// ============================================================================
	// Pass-through
	// ============================================================================

	/**
	 * Transform each value.
	 */
	map<R>(fn: (value: T, index: number) => R): Seq<R> {
		const self = this;
		return new Seq<R>(
			(function* () {
				let index = 0;
				for (const value of self) {
					yield fn(value, index++);
				}
			})(),
		);
	}

	/**
	 * Keep values matching the predicate.
	 */
	filter(predicate: (value: T, index: number) => boolean): Seq<T> {
		const self = this;
		return new Seq<T>(
			(function* () {
				let index = 0;
				for (const value of self) {
					if (predicate(value, index++)) {
						yield value;
					}
				}
			})(),
		);
	}

	/**
	 * Take the first n values. Pulls nothing past the n-th.
	 */
	take(n: number): Seq<T> {
		const self = this;
		return new Seq<T>(
			(function* () {
				if (n <= 0) return;
				let count = 0;
				for (const value of self) {
					yield value;
					if (++count >= n) break;
				}
			})(),
		);
	}

	// ============================================================================
	// Stateful combinators
	// ============================================================================

	/**
	 * Put a lookahead buffer of `capacity` in front of this sequence.
	 */
	peekable(capacity: number): LookaheadBuffer<T> {
		return new LookaheadBuffer(this, capacity);
	}

	/**
	 * Split into runs of consecutive values with equivalent keys.
	 */
	groupBy<K>(
		keyFn: (value: T) => K,
		options?: GroupingOptions<K>,
	): GroupingEngine<T, K> {
		return new GroupingEngine(this, keyFn, options);
	}

	/**
	 * Like groupBy, but collects each run into an array.
	 */
	groupArrays<K>(
		keyFn: (value: T) => K,
		options?: GroupingOptions<K>,
	): Seq<GroupedItems<K, T>> {
		const engine = new GroupingEngine(this, keyFn, options);
		return new Seq(
			(function* () {
				for (const group of engine) {
					yield collectGroup(group);
				}
			})(),
		);
	}

	/**
	 * Fixed or sliding windows.
	 */
	windows(options: WindowOptions<T>): Seq<Window<T>> {
		return new Seq(new WindowEngine(this, options));
	}

	/**
	 * Consecutive chunks of `size`; the last may be shorter.
	 */
	chunks(size: number): Seq<Window<T>> {
		return new Seq(chunks(this, size));
	}

	/**
	 * Merge with other sources sorted under the same order. This sequence
	 * wins ties.
	 */
	mergeWith(
		others: readonly SourceInput<T>[],
		options?: MergeOptions<T>,
	): Seq<T> {
		return new Seq(new MergeEngine<T>([this, ...others], options));
	}

	// ============================================================================
	// Terminal operations
	// ============================================================================

	/**
	 * Fold with a step function that may stop early.
	 */
	tryFold<Acc, E = never>(
		initial: Acc,
		step: StepFn<Acc, T, E>,
	): FoldOutcome<Acc, E> {
		return tryFold(this, initial, step);
	}

	/**
	 * Collect all values.
	 * Returns Result tuple; producer failures arrive as SourceError.
	 */
	toArray(): Result<IterlaneError, T[]> {
		const values: T[] = [];
		try {
			for (const value of this) {
				values.push(value);
			}
			return [undefined, values];
		} catch (err) {
			return [toTypedError(err), undefined];
		}
	}

	/**
	 * Consume every value without keeping them.
	 * Returns Result tuple with the number of values consumed.
	 */
	drain(): Result<IterlaneError, number> {
		let count = 0;
		try {
			for (const _value of this) {
				count++;
			}
			return [undefined, count];
		} catch (err) {
			return [toTypedError(err), undefined];
		}
	}
}

function collectGroup<T, K>(group: Group<T, K>): GroupedItems<K, T> {
	return { key: group.key, items: group.toArray() };
}

/**
 * Wrap an iterable or source for chaining.
 */
export function seq<T>(input: SourceInput<T>): Seq<T> {
	return new Seq(input);
}
