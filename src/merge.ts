/**
 * MergeEngine for iterlane - k-way merge of ordered sources
 */

import createDebug from "debug";
import { type ResolvedMergeOptions, resolveMergeOptions } from "./config.js";
import { InvalidArgumentError } from "./errors.js";
import { MinHeap } from "./heap.js";
import { toSource } from "./source.js";
import type { MergeOptions, SequenceSource, SourceInput } from "./types.js";

const debugMerge = createDebug("iterlane:merge");

interface HeadEntry<T> {
	readonly head: T;
	readonly sourceIndex: number;
}

type MergeState = "idle" | "running" | "done";

/**
 * Merges sources that are each sorted ascending under one comparator into
 * a single sorted sequence.
 *
 * Equal elements from different sources come out in ascending source
 * order; elements of one source keep their relative order. The heap holds
 * at most one head per live source, and a source's next head is pulled only
 * when the merge is asked for the element after the one it just supplied.
 *
 * Inputs that are not actually sorted are not an error: the merge never
 * crashes or reorders, but output order in the affected region is
 * unspecified. The first out-of-order element of each source is reported
 * through the logger at warn level.
 *
 * A producer error stops the merge: it propagates unchanged and every later
 * call reports exhaustion.
 *
 * @example
 * ```typescript
 * const byTime = (a: Event, b: Event) => a.at - b.at
 * for (const event of merge([shardA, shardB, shardC], { comparator: byTime })) {
 *   apply(event)
 * }
 * ```
 */
export class MergeEngine<T> implements IterableIterator<T> {
	private readonly sources: SequenceSource<T>[];
	private readonly options: ResolvedMergeOptions<T>;
	private readonly heap: MinHeap<HeadEntry<T>>;
	private readonly warned = new Set<number>();
	private state: MergeState = "idle";
	private refill: HeadEntry<T> | undefined;

	constructor(sources: readonly SourceInput<T>[], options?: MergeOptions<T>) {
		if (sources.length === 0) {
			throw new InvalidArgumentError("merge needs at least one source");
		}
		this.options = resolveMergeOptions(options);
		this.sources = sources.map((source) => toSource(source));

		const { comparator } = this.options;
		this.heap = new MinHeap<HeadEntry<T>>(
			(a, b) => comparator(a.head, b.head) || a.sourceIndex - b.sourceIndex,
		);
	}

	/** Number of sources that still have a head in the heap */
	get liveSources(): number {
		return this.heap.size + (this.refill ? 1 : 0);
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this;
	}

	next(): IteratorResult<T, undefined> {
		if (this.state === "done") return { done: true, value: undefined };

		let entry: HeadEntry<T> | undefined;
		try {
			if (this.state === "idle") {
				this.prime();
			} else if (this.refill) {
				const previous = this.refill;
				this.refill = undefined;
				this.pullHead(previous.sourceIndex, previous);
			}
			entry = this.heap.pop();
		} catch (error) {
			this.state = "done";
			debugMerge("stopped on source or comparator error");
			throw error;
		}

		if (!entry) {
			this.state = "done";
			debugMerge("all sources exhausted");
			return { done: true, value: undefined };
		}
		this.refill = entry;
		return { done: false, value: entry.head };
	}

	private prime(): void {
		this.state = "running";
		debugMerge("priming %d source(s)", this.sources.length);
		for (let i = 0; i < this.sources.length; i++) {
			this.pullHead(i);
		}
	}

	/**
	 * Pull the next head of source `index` into the heap, or retire the
	 * source when it is exhausted.
	 */
	private pullHead(index: number, previous?: HeadEntry<T>): void {
		const result = this.sources[index].next();
		if (result.done) {
			debugMerge("source %d exhausted", index);
			return;
		}
		if (
			previous &&
			this.options.comparator(result.value, previous.head) < 0 &&
			!this.warned.has(index)
		) {
			this.warned.add(index);
			this.options.logger.warn(
				`source ${index} is not sorted; merge order is unspecified from here`,
			);
		}
		this.heap.push({ head: result.value, sourceIndex: index });
	}
}

/**
 * Merge sorted sources into one sorted sequence.
 */
export function merge<T>(
	sources: readonly SourceInput<T>[],
	options?: MergeOptions<T>,
): MergeEngine<T> {
	return new MergeEngine(sources, options);
}
