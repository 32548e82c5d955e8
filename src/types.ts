/**
 * Type definitions and interfaces for iterlane
 */

export type Success<T> = readonly [undefined, T];
export type Failure<E> = readonly [E, undefined];
export type Result<E, T> = Success<T> | Failure<E>;

/**
 * Anything that can be asked, repeatedly, for its next element.
 *
 * This is the ECMAScript iterator contract reduced to its one required
 * method: `done: true` means exhaustion, a thrown exception means the
 * producer failed.
 */
export interface SequenceSource<T> {
	next(): IteratorResult<T, unknown>;
}

/**
 * Input accepted by every engine constructor.
 */
export type SourceInput<T> = SequenceSource<T> | Iterable<T>;

/**
 * Caller-supplied total order. Negative when `a` sorts before `b`.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Caller-supplied key equivalence for grouping.
 */
export type Equivalence<K> = (a: K, b: K) => boolean;

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface for structured logging integration
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Logging options shared by every engine.
 */
export interface LoggingOptions {
	/** Logger instance */
	logger?: Logger;
	/** Minimum log level for the built-in console logger */
	logLevel?: LogLevel;
}

/**
 * What a GroupingEngine does when the next group is requested while the
 * current one still has elements pending.
 */
export type UnfinishedGroupPolicy = "error" | "autoDrain";

/**
 * Options for GroupingEngine
 */
export interface GroupingOptions<K> extends LoggingOptions {
	/**
	 * Key equivalence. Default: SameValueZero (`===`, with NaN equal to NaN).
	 */
	equivalence?: Equivalence<K>;
	/**
	 * Behaviour on advancing past an undrained group. Default: "error".
	 */
	unfinishedGroupPolicy?: UnfinishedGroupPolicy;
}

/**
 * Options for MergeEngine
 */
export interface MergeOptions<T> extends LoggingOptions {
	/**
	 * Ordering every input is sorted by. Default: natural `<` / `>` order.
	 */
	comparator?: Comparator<T>;
}

/**
 * What a WindowEngine does with an incomplete trailing window.
 *
 * - `"drop"` - never emit it (default)
 * - `"emitPartial"` - emit it shorter than the window size
 * - `{ emitPadded: fill }` - emit it padded to the window size with `fill`
 */
export type TailPolicy<T> = "drop" | "emitPartial" | { readonly emitPadded: T };

/**
 * Options for WindowEngine
 */
export interface WindowOptions<T> extends LoggingOptions {
	/** Window size, an integer >= 1 */
	size: number;
	/**
	 * Elements to advance between windows, an integer >= 1. Default: 1.
	 */
	stride?: number;
	/** Trailing window policy. Default: "drop" */
	tailPolicy?: TailPolicy<T>;
}

/**
 * A window handed out by WindowEngine. Frozen at yield time.
 */
export type Window<T> = readonly T[];

/**
 * Result of one FallibleFold step.
 */
export type StepResult<Acc, E> =
	| { readonly type: "continue"; readonly acc: Acc }
	| { readonly type: "stopSuccess"; readonly acc: Acc }
	| { readonly type: "stopError"; readonly error: E };

export type StepFn<Acc, T, E> = (
	acc: Acc,
	value: T,
	index: number,
) => StepResult<Acc, E>;

/**
 * Options for FallibleFold
 */
export interface FoldOptions<Acc, T, E> extends LoggingOptions {
	initial: Acc;
	step: StepFn<Acc, T, E>;
}

/**
 * How a FallibleFold traversal ended.
 *
 * `acc` on `stoppedByError` is the last accumulator produced before the
 * failing step.
 */
export type FoldOutcome<Acc, E> =
	| { readonly reason: "exhausted"; readonly acc: Acc }
	| { readonly reason: "stoppedBySuccess"; readonly acc: Acc }
	| { readonly reason: "stoppedByError"; readonly acc: Acc; readonly error: E };
