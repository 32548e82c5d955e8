/**
 * iterlane - Stateful lazy combinators for synchronous iterators
 *
 * Lookahead buffering, grouping of consecutive runs, k-way merging of
 * sorted sources, fixed and sliding windows, and short-circuiting folds.
 * Every combinator pulls lazily, reads each input once in order, and is
 * itself an iterator, so they chain freely.
 *
 * @example
 * ```typescript
 * import { seq, merge, Step } from "iterlane";
 *
 * const [err, sessions] = seq(merge([logA, logB], { comparator: byTime }))
 *   .groupArrays(entry => entry.sessionId)
 *   .toArray();
 * ```
 */

export type {
	Comparator,
	Equivalence,
	Failure,
	FoldOptions,
	FoldOutcome,
	GroupingOptions,
	Logger,
	LoggingOptions,
	LogLevel,
	MergeOptions,
	Result,
	SequenceSource,
	SourceInput,
	StepFn,
	StepResult,
	Success,
	TailPolicy,
	UnfinishedGroupPolicy,
	Window,
	WindowOptions,
} from "./types.js";

export {
	ExhaustedError,
	InvalidArgumentError,
	IterlaneError,
	SourceError,
	StaleGroupError,
	UnfinishedGroupError,
} from "./errors.js";

export { ConsoleLogger, NoOpLogger, createLogger } from "./logger.js";
export { naturalOrder } from "./config.js";
export { isSequenceSource, toSource } from "./source.js";
export { failure, isFailure, isSuccess, success } from "./result.js";

export { LookaheadBuffer, lookahead } from "./lookahead.js";
export { Group, GroupingEngine, groupBy } from "./grouping.js";
export { MergeEngine, merge } from "./merge.js";
export { WindowEngine, chunks, windows } from "./window.js";
export { FallibleFold, Step, tryFold, withFolding } from "./fold.js";
export { withFiltered } from "./filtered.js";
export { type GroupedItems, Seq, seq } from "./seq.js";
