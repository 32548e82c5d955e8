/**
 * FallibleFold for iterlane - short-circuiting traversal
 */

import createDebug from "debug";
import { InvalidArgumentError } from "./errors.js";
import { createLogger } from "./logger.js";
import { isFailure } from "./result.js";
import { toSource } from "./source.js";
import type {
	Failure,
	FoldOptions,
	FoldOutcome,
	Logger,
	Result,
	SequenceSource,
	SourceInput,
	StepFn,
	StepResult,
} from "./types.js";

const debugFold = createDebug("iterlane:fold");

/**
 * Constructors for step results.
 *
 * @example
 * ```typescript
 * const outcome = tryFold(lines, 0, (total, line) => {
 *   const n = Number(line)
 *   if (Number.isNaN(n)) return Step.stopError(`not a number: ${line}`)
 *   if (total + n > limit) return Step.stopSuccess(total)
 *   return Step.continue(total + n)
 * })
 * ```
 */
export const Step = {
	continue<Acc>(acc: Acc): StepResult<Acc, never> {
		return { type: "continue", acc };
	},
	stopSuccess<Acc>(acc: Acc): StepResult<Acc, never> {
		return { type: "stopSuccess", acc };
	},
	stopError<E>(error: E): StepResult<never, E> {
		return { type: "stopError", error };
	},
} as const;

/**
 * Drives a traversal with a step function that may stop it early.
 *
 * Exactly one element is pulled per step and nothing is pulled after a
 * stop, so a fold that stops at position k has pulled k + 1 elements.
 * Errors the step function returns end the traversal as
 * `stoppedByError`; errors the source throws propagate unchanged.
 */
export class FallibleFold<Acc, T, E> {
	private readonly source: SequenceSource<T>;
	private readonly step: StepFn<Acc, T, E>;
	private readonly initial: Acc;
	private readonly logger: Logger;
	private started = false;

	constructor(source: SourceInput<T>, options: FoldOptions<Acc, T, E>) {
		this.source = toSource(source);
		this.step = options.step;
		this.initial = options.initial;
		this.logger = createLogger(
			"iterlane:fold",
			options.logger,
			options.logLevel,
		);
	}

	/**
	 * Run the traversal. A fold runs once; its source is spent afterwards.
	 */
	run(): FoldOutcome<Acc, E> {
		if (this.started) {
			throw new InvalidArgumentError(
				"FallibleFold.run() may only be called once",
			);
		}
		this.started = true;

		let acc = this.initial;
		let index = 0;
		while (true) {
			const result = this.source.next();
			if (result.done) {
				debugFold("ran to exhaustion after %d element(s)", index);
				return { reason: "exhausted", acc };
			}

			const step = this.step(acc, result.value, index);
			index++;
			switch (step.type) {
				case "continue":
					acc = step.acc;
					break;
				case "stopSuccess":
					debugFold("stopped with success at element %d", index - 1);
					return { reason: "stoppedBySuccess", acc: step.acc };
				case "stopError":
					this.logger.debug(
						`fold stopped with error at element ${index - 1}`,
					);
					return { reason: "stoppedByError", acc, error: step.error };
			}
		}
	}
}

/**
 * Fold `source` with a step function that may stop early.
 */
export function tryFold<Acc, T, E = never>(
	source: SourceInput<T>,
	initial: Acc,
	step: StepFn<Acc, T, E>,
): FoldOutcome<Acc, E> {
	return new FallibleFold(source, { initial, step }).run();
}

/**
 * Yields the success values of a Result source and stops at the first
 * failure, recording it instead of yielding it.
 */
class BreakingSource<E, T> implements IterableIterator<T> {
	private failure: Failure<E> | undefined;

	constructor(private readonly source: SequenceSource<Result<E, T>>) {}

	/** The first failure seen, if any */
	get error(): Failure<E> | undefined {
		return this.failure;
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this;
	}

	next(): IteratorResult<T, undefined> {
		if (this.failure) return { done: true, value: undefined };

		const result = this.source.next();
		if (result.done) return { done: true, value: undefined };

		const item = result.value;
		if (isFailure(item)) {
			this.failure = item;
			return { done: true, value: undefined };
		}
		return { done: false, value: item[1] };
	}
}

/**
 * Run a fold-style consumer over the success values of a Result source,
 * breaking off at the first failure.
 *
 * Returns that failure when there is one, otherwise the consumer's result.
 * Nothing is pulled from the source after the failure.
 *
 * @example
 * ```typescript
 * const [err, total] = withFolding(parsed, (values) => {
 *   let sum = 0
 *   for (const n of values) sum += n
 *   return sum
 * })
 * ```
 */
export function withFolding<E, T, O>(
	source: SourceInput<Result<E, T>>,
	fn: (values: IterableIterator<T>) => O,
): Result<E, O> {
	const breaking = new BreakingSource(toSource(source));
	const output = fn(breaking);
	return breaking.error ?? [undefined, output];
}
