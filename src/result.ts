/**
 * Result tuple helpers
 */

import type { Failure, Result, Success } from "./types.js";

export function success<T>(value: T): Success<T> {
	return [undefined, value];
}

export function failure<E>(error: E): Failure<E> {
	return [error, undefined];
}

export function isFailure<E, T>(result: Result<E, T>): result is Failure<E> {
	return result[0] !== undefined;
}

export function isSuccess<E, T>(result: Result<E, T>): result is Success<T> {
	return result[0] === undefined;
}
