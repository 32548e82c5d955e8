/**
 * Sequence Source helpers
 */

import type { SequenceSource, SourceInput } from "./types.js";

/**
 * Type guard for the one-method source capability.
 */
export function isSequenceSource<T>(
	value: SourceInput<T>,
): value is SequenceSource<T> {
	return (
		typeof value === "object" &&
		value !== null &&
		"next" in value &&
		typeof value.next === "function"
	);
}

/**
 * Normalise an iterable or a bare source into a source.
 *
 * Iterators that are also iterable (generators, array iterators) are used
 * as they are, so ownership moves to the caller without a second cursor.
 */
export function toSource<T>(input: SourceInput<T>): SequenceSource<T> {
	if (isSequenceSource(input)) return input;
	return input[Symbol.iterator]();
}
