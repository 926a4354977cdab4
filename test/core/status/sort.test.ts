import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	compareCodePoints,
	pathDepth,
	sortStatusEntries,
} from "../../../src/core/status/sort.js";
import type { StatusCode } from "../../../src/core/types/index.js";

const statusMap = (
	paths: ReadonlyArray<string>,
	code: StatusCode = "??",
): ReadonlyMap<string, StatusCode> => new Map(paths.map((path) => [path, code]));

describe("pathDepth", () => {
	it("counts a trailing slash as an extra segment", () => {
		expect(pathDepth("a.txt")).toBe(1);
		expect(pathDepth("dir/")).toBe(2);
		expect(pathDepth("dir/sub/file")).toBe(3);
	});
});

describe("compareCodePoints", () => {
	it("orders by code point and puts a prefix first", () => {
		expect(compareCodePoints("\u{10000}", "\uFFFF")).toBeGreaterThan(0);
		expect(compareCodePoints("ab", "abc")).toBeLessThan(0);
		expect(compareCodePoints("\u{1F600}a", "\u{1F600}a")).toBe(0);
	});
});

describe("sortStatusEntries", () => {
	it("orders deeper paths first and breaks ties by path", () => {
		const sorted = sortStatusEntries({
			statuses: statusMap([
				"a.txt",
				"src/b.txt",
				"src/deep/c.txt",
				"src/a.txt",
				"ignored/",
			]),
			renameSources: new Map(),
		});
		expect(sorted.map((e) => e.path)).toEqual([
			"src/deep/c.txt",
			"ignored/",
			"src/a.txt",
			"src/b.txt",
			"a.txt",
		]);
	});

	it("compares by code unit rather than locale", () => {
		const sorted = sortStatusEntries({
			statuses: statusMap(["a.txt", "B.txt"]),
			renameSources: new Map(),
		});
		expect(sorted.map((e) => e.path)).toEqual(["B.txt", "a.txt"]);
	});

	it("places astral characters after the private use area", () => {
		const sorted = sortStatusEntries({
			statuses: statusMap(["\u{1F600}.txt", "\uE000.txt"]),
			renameSources: new Map(),
		});
		expect(sorted.map((e) => e.path)).toEqual(["\uE000.txt", "\u{1F600}.txt"]);
	});

	it("attaches rename sources and null for everything else", () => {
		const sorted = sortStatusEntries({
			statuses: new Map<string, StatusCode>([
				["new.txt", "R."],
				["other.txt", ".M"],
			]),
			renameSources: new Map([["new.txt", "old.txt"]]),
		});
		expect(sorted).toEqual([
			{ path: "new.txt", statusCode: "R.", renameSource: "old.txt" },
			{ path: "other.txt", statusCode: ".M", renameSource: null },
		]);
	});

	it("does not depend on map insertion order", () => {
		const segment = fc.constantFrom("a", "b", "c", "x.txt", "y.txt");
		const path = fc
			.array(segment, { minLength: 1, maxLength: 4 })
			.map((parts) => parts.join("/"));
		fc.assert(
			fc.property(fc.uniqueArray(path, { maxLength: 12 }), (paths) => {
				const forward = sortStatusEntries({
					statuses: statusMap(paths),
					renameSources: new Map(),
				});
				const backward = sortStatusEntries({
					statuses: statusMap([...paths].reverse()),
					renameSources: new Map(),
				});
				expect(backward).toEqual(forward);
			}),
		);
	});
});
