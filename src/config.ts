/**
 * Option validation and defaults for every engine.
 *
 * Behaviour depends on construction arguments alone; the defaults below are
 * the only implicit values in the library.
 */

import { InvalidArgumentError } from "./errors.js";
import { createLogger } from "./logger.js";
import type {
	Comparator,
	Equivalence,
	GroupingOptions,
	Logger,
	LoggingOptions,
	MergeOptions,
	TailPolicy,
	UnfinishedGroupPolicy,
	WindowOptions,
} from "./types.js";

export const DEFAULT_UNFINISHED_GROUP_POLICY: UnfinishedGroupPolicy = "error";
export const DEFAULT_STRIDE = 1;
export const DEFAULT_TAIL_POLICY = "drop" as const;

export interface ResolvedGroupingOptions<K> {
	readonly equivalence: Equivalence<K>;
	readonly unfinishedGroupPolicy: UnfinishedGroupPolicy;
	readonly logger: Logger;
}

export interface ResolvedMergeOptions<T> {
	readonly comparator: Comparator<T>;
	readonly logger: Logger;
}

export interface ResolvedWindowOptions<T> {
	readonly size: number;
	readonly stride: number;
	readonly tailPolicy: TailPolicy<T>;
	readonly logger: Logger;
}

type Ordered = number | string | bigint;

function orderedValue(value: unknown): Ordered | undefined {
	if (
		typeof value === "number" ||
		typeof value === "string" ||
		typeof value === "bigint"
	) {
		return value;
	}
	if (value instanceof Date) return value.getTime();
	return undefined;
}

/**
 * Natural ordering for numbers, strings, bigints and dates.
 * Anything else needs an explicit comparator.
 */
export function naturalOrder(a: unknown, b: unknown): number {
	const left = orderedValue(a);
	const right = orderedValue(b);
	if (left === undefined || right === undefined) {
		throw new InvalidArgumentError(
			"Values have no natural order; pass a comparator",
		);
	}
	if (left < right) return -1;
	if (left > right) return 1;
	return 0;
}

/**
 * SameValueZero: `===`, except that NaN equals NaN.
 */
export function sameValueZero(a: unknown, b: unknown): boolean {
	return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Throw unless `value` is an integer >= `min`.
 */
export function assertInteger(name: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new InvalidArgumentError(
			`${name} must be an integer >= ${min}, got ${value}`,
		);
	}
}

function resolveLogger(name: string, options: LoggingOptions): Logger {
	return createLogger(name, options.logger, options.logLevel);
}

export function resolveGroupingOptions<K>(
	options: GroupingOptions<K> = {},
): ResolvedGroupingOptions<K> {
	const policy =
		options.unfinishedGroupPolicy ?? DEFAULT_UNFINISHED_GROUP_POLICY;
	if (policy !== "error" && policy !== "autoDrain") {
		throw new InvalidArgumentError(
			`unfinishedGroupPolicy must be "error" or "autoDrain", got ${String(policy)}`,
		);
	}
	return {
		equivalence: options.equivalence ?? sameValueZero,
		unfinishedGroupPolicy: policy,
		logger: resolveLogger("iterlane:group", options),
	};
}

export function resolveMergeOptions<T>(
	options: MergeOptions<T> = {},
): ResolvedMergeOptions<T> {
	return {
		comparator: options.comparator ?? naturalOrder,
		logger: resolveLogger("iterlane:merge", options),
	};
}

export function resolveWindowOptions<T>(
	options: WindowOptions<T>,
): ResolvedWindowOptions<T> {
	const stride = options.stride ?? DEFAULT_STRIDE;
	assertInteger("size", options.size, 1);
	assertInteger("stride", stride, 1);

	const tailPolicy = options.tailPolicy ?? DEFAULT_TAIL_POLICY;
	if (
		typeof tailPolicy === "string" &&
		tailPolicy !== "drop" &&
		tailPolicy !== "emitPartial"
	) {
		throw new InvalidArgumentError(
			`tailPolicy must be "drop", "emitPartial" or { emitPadded }, got ${tailPolicy}`,
		);
	}

	return {
		size: options.size,
		stride,
		tailPolicy,
		logger: resolveLogger("iterlane:window", options),
	};
}
