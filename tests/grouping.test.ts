/**
 * Tests for GroupingEngine and Group
 */

import { describe, expect, test } from "vitest";
import {
	GroupingEngine,
	type Logger,
	StaleGroupError,
	UnfinishedGroupError,
	groupBy,
	seq,
} from "../src/index.js";
import { counting, failingAfter } from "./helpers.js";

function collectGroups<T, K>(engine: GroupingEngine<T, K>): [K, T[]][] {
	const out: [K, T[]][] = [];
	for (const group of engine) {
		out.push([group.key, group.toArray()]);
	}
	return out;
}

function recordingLogger(): Logger & { messages: string[] } {
	const messages: string[] = [];
	return {
		messages,
		debug: (message) => messages.push(`debug: ${message}`),
		info: (message) => messages.push(`info: ${message}`),
		warn: (message) => messages.push(`warn: ${message}`),
		error: (message) => messages.push(`error: ${message}`),
	};
}

describe("GroupingEngine - runs", () => {
	test("groups consecutive equal keys", () => {
		const engine = groupBy([1, 1, 2, 2, 2, 3], (x) => x);

		expect(collectGroups(engine)).toEqual([
			[1, [1, 1]],
			[2, [2, 2, 2]],
			[3, [3]],
		]);
	});

	test("non-adjacent equal keys start separate groups", () => {
		const words = ["ant", "ape", "bee", "asp", "bat", "boa"];
		const engine = groupBy(words, (w) => w[0]);

		expect(collectGroups(engine)).toEqual([
			["a", ["ant", "ape"]],
			["b", ["bee"]],
			["a", ["asp"]],
			["b", ["bat", "boa"]],
		]);
	});

	test("empty source yields no groups", () => {
		const engine = groupBy([], (x: number) => x);

		expect(engine.next()).toEqual({ done: true, value: undefined });
		expect(engine.next()).toEqual({ done: true, value: undefined });
	});

	test("groups are numbered from zero", () => {
		const engine = groupBy("aabccc", (c) => c);
		const indexes: number[] = [];
		for (const group of engine) {
			indexes.push(group.index);
			group.toArray();
		}

		expect(indexes).toEqual([0, 1, 2]);
	});

	test("custom equivalence decides group boundaries", () => {
		const engine = groupBy(["a", "A", "b", "B", "b"], (s) => s, {
			equivalence: (a, b) => a.toLowerCase() === b.toLowerCase(),
		});

		expect(collectGroups(engine)).toEqual([
			["a", ["a", "A"]],
			["b", ["b", "B", "b"]],
		]);
	});

	test("NaN keys group together by default", () => {
		const engine = groupBy([Number.NaN, Number.NaN, 1], (x) => x);

		expect(collectGroups(engine)).toEqual([
			[Number.NaN, [Number.NaN, Number.NaN]],
			[1, [1]],
		]);
	});

	test("the opening element joins its group under a non-reflexive equivalence", () => {
		const engine = groupBy([1, 1, 2], (x) => x, { equivalence: () => false });

		expect(collectGroups(engine)).toEqual([
			[1, [1]],
			[1, [1]],
			[2, [2]],
		]);
	});

	test("keys need not be orderable", () => {
		const red = { name: "red" };
		const blue = { name: "blue" };
		const items = [
			{ id: 1, color: red },
			{ id: 2, color: red },
			{ id: 3, color: blue },
		];
		const engine = groupBy(items, (item) => item.color);

		const groups = collectGroups(engine);
		expect(groups.map(([key]) => key)).toEqual([red, blue]);
		expect(groups.map(([, items]) => items.map((i) => i.id))).toEqual([
			[1, 2],
			[3],
		]);
	});

	test("key function runs once per element", () => {
		const calls: number[] = [];
		const engine = groupBy([1, 1, 2, 3, 3], (x) => {
			calls.push(x);
			return x;
		});
		collectGroups(engine);

		expect(calls).toEqual([1, 1, 2, 3, 3]);
	});
});

describe("GroupingEngine - laziness", () => {
	test("opening a group pulls only its first element", () => {
		const source = counting([1, 1, 2]);
		const engine = new GroupingEngine(source, (x) => x);

		const first = engine.nextGroup();
		expect(first.done).toBe(false);
		expect(source.pulls).toBe(1);
	});

	test("reading a group stops at the boundary without consuming past it", () => {
		const source = counting([5, 5, 6, 7]);
		const engine = new GroupingEngine(source, (x) => x);

		const group = engine.nextGroup();
		if (group.done) throw new Error("expected a group");
		expect(group.value.toArray()).toEqual([5, 5]);
		expect(source.pulls).toBe(3);
		expect(group.value.finished).toBe(true);

		const second = engine.nextGroup();
		if (second.done) throw new Error("expected a group");
		expect(second.value.key).toBe(6);
		expect(source.pulls).toBe(3);
	});

	test("a group can feed another combinator", () => {
		const engine = groupBy([1, 1, 1, 1, 2], (x) => x);
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");

		const [err, windows] = seq(first.value).windows({ size: 2 }).toArray();

		expect(err).toBeUndefined();
		expect(windows).toEqual([
			[1, 1],
			[1, 1],
			[1, 1],
		]);
	});
});

describe("GroupingEngine - unfinished groups", () => {
	test("error policy rejects advancing past an undrained group", () => {
		const engine = groupBy([1, 1, 2], (x) => x);
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");
		first.value.next();

		expect(() => engine.nextGroup()).toThrow(UnfinishedGroupError);
		// The group is left usable
		expect(first.value.next()).toEqual({ done: false, value: 1 });
		expect(first.value.next()).toEqual({ done: true, value: undefined });

		const second = engine.nextGroup();
		expect(second.done).toBe(false);
	});

	test("error is reported with the group index", () => {
		const engine = groupBy(["x", "x"], (x) => x);
		engine.nextGroup();

		let caught: unknown;
		try {
			engine.nextGroup();
		} catch (err) {
			caught = err;
		}

		expect(caught).toBeInstanceOf(UnfinishedGroupError);
		expect((caught as UnfinishedGroupError).groupIndex).toBe(0);
	});

	test("a group read up to its last element counts as drained", () => {
		const engine = groupBy([1, 1, 2], (x) => x);
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");
		first.value.next();
		first.value.next();

		const second = engine.nextGroup();
		if (second.done) throw new Error("expected a group");
		expect(second.value.toArray()).toEqual([2]);
	});

	test("autoDrain discards the rest of the current group", () => {
		const logger = recordingLogger();
		const engine = groupBy([1, 1, 1, 2, 2, 3], (x) => x, {
			unfinishedGroupPolicy: "autoDrain",
			logger,
		});

		const keys: number[] = [];
		const firstItems: number[] = [];
		for (const group of engine) {
			keys.push(group.key);
			const head = group.next();
			if (!head.done) firstItems.push(head.value);
		}

		expect(keys).toEqual([1, 2, 3]);
		expect(firstItems).toEqual([1, 2, 3]);
		expect(logger.messages).toEqual([
			"debug: auto-drained 2 element(s) from group 0",
			"debug: auto-drained 1 element(s) from group 1",
		]);
	});

	test("an untouched group is never closed as empty", () => {
		const engine = groupBy([1, 2], (x) => x, { equivalence: () => false });
		engine.nextGroup();

		expect(() => engine.nextGroup()).toThrow(UnfinishedGroupError);
	});

	test("autoDrain of an untouched group skips the whole run", () => {
		const engine = groupBy([1, 1, 2, 2, 3], (x) => x, {
			unfinishedGroupPolicy: "autoDrain",
		});
		engine.nextGroup();
		engine.nextGroup();
		const third = engine.nextGroup();
		if (third.done) throw new Error("expected a group");

		expect(third.value.toArray()).toEqual([3]);
	});
});

describe("GroupingEngine - invalidation", () => {
	test("reading a group after the engine advanced throws StaleGroupError", () => {
		const engine = groupBy([1, 2], (x) => x);
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");
		first.value.toArray();
		engine.nextGroup();

		expect(first.value.stale).toBe(true);
		expect(() => first.value.next()).toThrow(StaleGroupError);
	});

	test("the last group goes stale once the engine reports exhaustion", () => {
		const engine = groupBy([4, 4], (x) => x);
		const only = engine.nextGroup();
		if (only.done) throw new Error("expected a group");
		expect(only.value.toArray()).toEqual([4, 4]);
		expect(only.value.next()).toEqual({ done: true, value: undefined });

		expect(engine.nextGroup().done).toBe(true);
		expect(() => only.value.next()).toThrow(StaleGroupError);
	});

	test("stale group never returns data from the next run", () => {
		const engine = groupBy([1, 2, 2], (x) => x, {
			unfinishedGroupPolicy: "autoDrain",
		});
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");
		engine.nextGroup();

		expect(() => first.value.toArray()).toThrow(StaleGroupError);
	});
});

describe("GroupingEngine - errors", () => {
	test("source errors propagate out of the group read", () => {
		const boom = new Error("read failed");
		const engine = groupBy(failingAfter([1, 1], boom), (x) => x);
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");

		expect(first.value.next()).toEqual({ done: false, value: 1 });
		expect(first.value.next()).toEqual({ done: false, value: 1 });
		expect(() => first.value.next()).toThrow(boom);
	});

	test("key function errors propagate", () => {
		const engine = groupBy([1, 2], (x) => {
			if (x === 2) throw new Error("bad key");
			return x;
		});
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");

		expect(first.value.next()).toEqual({ done: false, value: 1 });
		expect(() => first.value.next()).toThrow("bad key");
	});

	test("an element whose key function threw is read again, not skipped", () => {
		let calls = 0;
		const engine = groupBy([1, 1, 1], (x) => {
			calls++;
			if (calls === 2) throw new Error("flaky key");
			return x;
		});
		const first = engine.nextGroup();
		if (first.done) throw new Error("expected a group");

		expect(first.value.next()).toEqual({ done: false, value: 1 });
		expect(() => first.value.next()).toThrow("flaky key");
		expect(first.value.toArray()).toEqual([1, 1]);
		expect(calls).toBe(4);
	});

	test("rejects an unknown policy", () => {
		expect(() =>
			groupBy([1], (x) => x, {
				unfinishedGroupPolicy: "skip" as "error",
			}),
		).toThrow('unfinishedGroupPolicy must be "error" or "autoDrain"');
	});
});
