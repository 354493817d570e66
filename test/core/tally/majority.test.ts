// CHANGE: Deterministic and property-based tests for majority selection
// FORMAT THEOREM: ∀t: sortTallyDesc(t) is ordered by count desc ∧ "" ∉ sortTallyDesc(t)
// PURITY: CORE

import { Either, Option } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	buildTally,
	computeConsensus,
	majorityOf,
	sortTallyDesc,
} from "../../../src/core/tally/majority.js";
import type { SourceFile } from "../../../src/core/types/index.js";

const makeFile = (copyright: string, license: string): SourceFile => ({
	path: "a.ts",
	relativePath: "a.ts",
	commentPrefix: "//",
	copyright,
	license,
});

describe("sortTallyDesc", () => {
	it("orders keys by descending count and drops the empty key", () => {
		const tally = new Map([
			["foo", 3],
			["bar", 4],
			["baz", 1],
			["quz", 2],
			["", 10],
		]);
		expect(sortTallyDesc(tally)).toEqual(["bar", "foo", "quz", "baz"]);
	});

	it("breaks ties lexicographically regardless of insertion order", () => {
		expect(sortTallyDesc(new Map([["b", 2], ["a", 2], ["c", 1]]))).toEqual([
			"a",
			"b",
			"c",
		]);
		expect(sortTallyDesc(new Map([["a", 2], ["b", 2], ["c", 1]]))).toEqual([
			"a",
			"b",
			"c",
		]);
	});

	it("never lets a lower count precede a higher one", () => {
		fc.assert(
			fc.property(
				fc.array(fc.tuple(fc.string(), fc.nat({ max: 50 }))),
				(entries) => {
					const tally = new Map(entries);
					const sorted = sortTallyDesc(tally);
					expect(sorted).not.toContain("");
					for (let i = 1; i < sorted.length; i++) {
						const prev = tally.get(sorted[i - 1] ?? "") ?? 0;
						const next = tally.get(sorted[i] ?? "") ?? 0;
						expect(prev).toBeGreaterThanOrEqual(next);
					}
				},
			),
		);
	});
});

describe("majorityOf", () => {
	it("returns the key with the highest count", () => {
		const tally = new Map([
			["foo", 3],
			["bar", 4],
			["baz", 1],
			["quz", 2],
		]);
		expect(Option.getOrNull(majorityOf(tally))).toBe("bar");
	});

	it("is none for an empty tally or one holding only the empty key", () => {
		expect(Option.isNone(majorityOf(new Map()))).toBe(true);
		expect(Option.isNone(majorityOf(new Map([["", 3]])))).toBe(true);
	});
});

describe("buildTally", () => {
	it("counts non-empty values only", () => {
		const tally = buildTally(["a", "", "b", "a", ""]);
		expect([...tally.entries()]).toEqual([
			["a", 2],
			["b", 1],
		]);
	});

	it("sums to the number of non-empty values", () => {
		fc.assert(
			fc.property(fc.array(fc.constantFrom("", "x", "y", "z")), (values) => {
				const total = [...buildTally(values).values()].reduce(
					(sum, n) => sum + n,
					0,
				);
				expect(total).toBe(values.filter((v) => v !== "").length);
			}),
		);
	});
});

describe("computeConsensus", () => {
	it("selects the majority copyright and license independently", () => {
		const result = computeConsensus([
			makeFile("Copyright A", "SPDX-License-Identifier: MIT"),
			makeFile("Copyright A", ""),
			makeFile("Copyright B", "SPDX-License-Identifier: MIT"),
			makeFile("", "SPDX-License-Identifier: Apache-2.0"),
		]);
		expect(Either.getOrNull(result)).toEqual({
			copyright: "Copyright A",
			license: "SPDX-License-Identifier: MIT",
		});
	});

	it("fails on copyright first when no file carries any notice", () => {
		const result = computeConsensus([makeFile("", "")]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.field).toBe("copyright");
		}
	});

	it("fails on license when copyrights exist but no license does", () => {
		const result = computeConsensus([makeFile("Copyright A", "")]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("NoConsensus");
			expect(result.left.field).toBe("license");
		}
	});

	it("fails on copyright for an empty file list", () => {
		const result = computeConsensus([]);
		expect(Either.isLeft(result) && result.left.field === "copyright").toBe(true);
	});
});
