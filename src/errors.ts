/**
 * Built-in error classes for iterlane
 */

/**
 * Base class of every error raised by the library itself.
 *
 * Producer failures are never wrapped in one of these by the combinators;
 * they are rethrown as-is.
 */
export abstract class IterlaneError extends Error {
	abstract readonly _tag: string;
}

/**
 * ExhaustedError - a peek or consume asked for more elements than remain.
 *
 * Recoverable: it only means there is no more data.
 *
 * @example
 * ```typescript
 * const buf = lookahead([1, 2], 4)
 * buf.peek(3) // throws ExhaustedError { requested: 4, available: 2 }
 * ```
 */
export class ExhaustedError extends IterlaneError {
	readonly _tag = "ExhaustedError" as const;
	/** Number of elements the call needed */
	readonly requested: number;
	/** Number of elements that were left */
	readonly available: number;

	constructor(requested: number, available: number) {
		super(
			`Sequence exhausted: requested ${requested} element(s), ${available} available`,
		);
		this.name = "ExhaustedError";
		this.requested = requested;
		this.available = available;
	}
}

/**
 * UnfinishedGroupError - the next group was requested while the current one
 * still had elements pending, under the "error" policy.
 */
export class UnfinishedGroupError extends IterlaneError {
	readonly _tag = "UnfinishedGroupError" as const;
	readonly groupIndex: number;

	constructor(groupIndex: number) {
		super(
			`Group ${groupIndex} must be drained before requesting the next group`,
		);
		this.name = "UnfinishedGroupError";
		this.groupIndex = groupIndex;
	}
}

/**
 * StaleGroupError - a Group was read after its engine moved past it.
 */
export class StaleGroupError extends IterlaneError {
	readonly _tag = "StaleGroupError" as const;
	readonly groupIndex: number;

	constructor(groupIndex: number) {
		super(`Group ${groupIndex} is no longer valid: the engine has advanced`);
		this.name = "StaleGroupError";
		this.groupIndex = groupIndex;
	}
}

/**
 * InvalidArgumentError - a constructor or method was called with arguments
 * outside their documented range.
 */
export class InvalidArgumentError extends IterlaneError {
	readonly _tag = "InvalidArgumentError" as const;

	constructor(message: string) {
		super(message);
		this.name = "InvalidArgumentError";
	}
}

/**
 * SourceError - wraps a producer failure in Result-returning terminals.
 *
 * The original error is kept untouched in `cause`.
 *
 * @example
 * ```typescript
 * const [err] = seq(readRows()).toArray()
 * if (err instanceof SourceError) {
 *   console.error('producer failed:', err.cause)
 * }
 * ```
 */
export class SourceError extends IterlaneError {
	readonly _tag = "SourceError" as const;

	constructor(cause: unknown) {
		super(
			cause instanceof Error
				? `Source failed: ${cause.message}`
				: `Source failed: ${String(cause)}`,
			{ cause },
		);
		this.name = "SourceError";
	}
}

/**
 * Keep library errors as they are and wrap anything else in a SourceError.
 */
export function toTypedError(error: unknown): IterlaneError {
	return error instanceof IterlaneError ? error : new SourceError(error);
}
