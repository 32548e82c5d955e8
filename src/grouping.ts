/**
 * GroupingEngine for iterlane - runs of consecutive elements sharing a key
 */

import createDebug from "debug";
import {
	type ResolvedGroupingOptions,
	resolveGroupingOptions,
} from "./config.js";
import { StaleGroupError, UnfinishedGroupError } from "./errors.js";
import { LookaheadBuffer } from "./lookahead.js";
import { toSource } from "./source.js";
import type {
	GroupingOptions,
	SequenceSource,
	SourceInput,
} from "./types.js";

const debugGroup = createDebug("iterlane:group");

interface Keyed<T, K> {
	readonly value: T;
	readonly key: K;
}

/**
 * Apply the key function once per element, as it is pulled.
 * An element whose key function threw is kept and keyed again on the next
 * pull instead of being lost.
 */
function keyedSource<T, K>(
	source: SequenceSource<T>,
	keyFn: (value: T) => K,
): SequenceSource<Keyed<T, K>> {
	let unkeyed: { readonly value: T } | undefined;
	return {
		next() {
			if (!unkeyed) {
				const result = source.next();
				if (result.done) return { done: true, value: undefined };
				unkeyed = { value: result.value };
			}
			const { value } = unkeyed;
			const key = keyFn(value);
			unkeyed = undefined;
			return { done: false, value: { value, key } };
		},
	};
}

/**
 * The part of the engine a Group reads through.
 */
interface GroupCursorOwner<T> {
	readonly generation: number;
	read(generation: number, groupIndex: number): IteratorResult<T, undefined>;
	isEnded(generation: number): boolean;
}

/**
 * One run of consecutive elements whose keys are equivalent.
 *
 * A Group holds no elements of its own: it is a cursor (engine reference +
 * generation) into the engine's lookahead buffer. Once the engine hands out
 * the next group, reading this one throws StaleGroupError.
 */
export class Group<T, K> implements IterableIterator<T> {
	constructor(
		private readonly owner: GroupCursorOwner<T>,
		private readonly generation: number,
		/** Key shared by every element of the run */
		readonly key: K,
		/** Ordinal of this group, starting at 0 */
		readonly index: number,
	) {}

	/** Whether the engine has moved past this group */
	get stale(): boolean {
		return this.owner.generation !== this.generation;
	}

	/** Whether the run's end has been observed */
	get finished(): boolean {
		return this.stale || this.owner.isEnded(this.generation);
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this;
	}

	next(): IteratorResult<T, undefined> {
		return this.owner.read(this.generation, this.index);
	}

	/**
	 * Collect the rest of the run.
	 */
	toArray(): T[] {
		const items: T[] = [];
		for (const item of this) {
			items.push(item);
		}
		return items;
	}
}

/**
 * Partitions a source into maximal runs of consecutive elements with
 * equivalent keys, yielding one Group per run.
 *
 * Only one group is live at a time. Under the default "error" policy the
 * current group must be drained before the next one is requested; under
 * "autoDrain" its remaining elements are discarded.
 *
 * @example
 * ```typescript
 * const engine = groupBy(logLines, line => line.requestId)
 *
 * for (const group of engine) {
 *   const lines = group.toArray()
 *   report(group.key, lines)
 * }
 * ```
 */
export class GroupingEngine<T, K>
	implements IterableIterator<Group<T, K>>, GroupCursorOwner<T>
{
	private readonly buffer: LookaheadBuffer<Keyed<T, K>>;
	private readonly options: ResolvedGroupingOptions<K>;
	private currentGeneration = 0;
	private current: Group<T, K> | undefined;
	private currentEnded = false;
	private currentYielded = false; // The opening element always belongs to its group
	private groupCount = 0;
	private done = false;

	constructor(
		source: SourceInput<T>,
		keyFn: (value: T) => K,
		options?: GroupingOptions<K>,
	) {
		this.options = resolveGroupingOptions(options);
		this.buffer = new LookaheadBuffer(keyedSource(toSource(source), keyFn), 1);
	}

	/** Bumped every time the engine moves past a group */
	get generation(): number {
		return this.currentGeneration;
	}

	[Symbol.iterator](): IterableIterator<Group<T, K>> {
		return this;
	}

	next(): IteratorResult<Group<T, K>, undefined> {
		return this.nextGroup();
	}

	/**
	 * Close the current group and open the next one.
	 */
	nextGroup(): IteratorResult<Group<T, K>, undefined> {
		if (this.done) return { done: true, value: undefined };

		if (this.current) {
			this.closeCurrent(this.current);
		}

		const head = this.buffer.tryPeek(0);
		if (head.done) {
			this.done = true;
			debugGroup("source exhausted after %d group(s)", this.groupCount);
			return { done: true, value: undefined };
		}

		const group = new Group<T, K>(
			this,
			this.currentGeneration,
			head.value.key,
			this.groupCount++,
		);
		this.current = group;
		this.currentEnded = false;
		this.currentYielded = false;
		debugGroup("opened group %d", group.index);
		return { done: false, value: group };
	}

	read(generation: number, groupIndex: number): IteratorResult<T, undefined> {
		if (generation !== this.currentGeneration || !this.current) {
			throw new StaleGroupError(groupIndex);
		}
		if (this.currentEnded) return { done: true, value: undefined };

		if (this.currentYielded && !this.headBelongsTo(this.current)) {
			this.currentEnded = true;
			return { done: true, value: undefined };
		}
		const value = this.buffer.peek(0).value;
		this.buffer.consume(1);
		this.currentYielded = true;
		return { done: false, value };
	}

	isEnded(generation: number): boolean {
		return generation === this.currentGeneration && this.currentEnded;
	}

	private headBelongsTo(group: Group<T, K>): boolean {
		const head = this.buffer.tryPeek(0);
		return !head.done && this.options.equivalence(group.key, head.value.key);
	}

	private closeCurrent(group: Group<T, K>): void {
		const pending =
			!this.currentEnded &&
			(!this.currentYielded || this.headBelongsTo(group));
		if (pending) {
			if (this.options.unfinishedGroupPolicy === "error") {
				throw new UnfinishedGroupError(group.index);
			}
			let discarded = 0;
			if (!this.currentYielded) {
				this.buffer.consume(1);
				this.currentYielded = true;
				discarded++;
			}
			while (this.headBelongsTo(group)) {
				this.buffer.consume(1);
				discarded++;
			}
			debugGroup("auto-drained group %d", group.index);
			this.options.logger.debug(
				`auto-drained ${discarded} element(s) from group ${group.index}`,
			);
		}
		this.current = undefined;
		this.currentGeneration++;
	}
}

/**
 * Group consecutive elements of `source` by `keyFn`.
 */
export function groupBy<T, K>(
	source: SourceInput<T>,
	keyFn: (value: T) => K,
	options?: GroupingOptions<K>,
): GroupingEngine<T, K> {
	return new GroupingEngine(source, keyFn, options);
}
