/**
 * Test sources that record how they are pulled
 */

import type { SequenceSource } from "../src/index.js";

export interface CountingSource<T> extends SequenceSource<T> {
	/** Number of elements handed out so far */
	readonly pulls: number;
	/** Number of next() calls, including ones that reported exhaustion */
	readonly calls: number;
}

/**
 * A source over `items` that counts every pull.
 */
export function counting<T>(items: readonly T[]): CountingSource<T> {
	let index = 0;
	let calls = 0;
	return {
		get pulls() {
			return index;
		},
		get calls() {
			return calls;
		},
		next() {
			calls++;
			if (index >= items.length) return { done: true, value: undefined };
			return { done: false, value: items[index++] };
		},
	};
}

/**
 * A source that yields `items` and then throws `error`.
 */
export function failingAfter<T>(
	items: readonly T[],
	error: unknown,
): CountingSource<T> {
	let index = 0;
	let calls = 0;
	return {
		get pulls() {
			return index;
		},
		get calls() {
			return calls;
		},
		next() {
			calls++;
			if (index >= items.length) throw error;
			return { done: false, value: items[index++] };
		},
	};
}

/**
 * A source over `items` that throws `error` once, on the pull of position
 * `failAt`, and then carries on from that same position.
 */
export function failingOnceAt<T>(
	items: readonly T[],
	failAt: number,
	error: unknown,
): SequenceSource<T> {
	let index = 0;
	let failed = false;
	return {
		next() {
			if (index === failAt && !failed) {
				failed = true;
				throw error;
			}
			if (index >= items.length) return { done: true, value: undefined };
			return { done: false, value: items[index++] };
		},
	};
}

// Seeded random number generator for reproducibility
export function createRNG(seed: number) {
	let s = seed;
	return () => {
		s = Math.sin(s * 12.9898 + 78.233) * 43758.5453;
		return s - Math.floor(s);
	};
}

export function randomInts(
	rng: () => number,
	length: number,
	max: number,
): number[] {
	return Array.from({ length }, () => Math.floor(rng() * max));
}
