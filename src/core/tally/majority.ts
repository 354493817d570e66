// CHANGE: Frequency tallies and majority selection over header values
// WHY: The consensus copyright/license is the most frequent non-empty value in the tree
// FORMAT THEOREM: ∀t: sortTallyDesc(t) is ordered by (count desc, key asc) ∧ "" ∉ sortTallyDesc(t)
// PURITY: CORE
// INVARIANT: Σ counts(buildTally(vs)) = |{v ∈ vs : v ≠ ""}|
// COMPLEXITY: O(n + k log k) where n = |values|, k = |distinct values|

import { Either, Option, pipe } from "effect";

import { NoConsensus } from "../errors.js";
import type { Consensus, SourceFile, Tally } from "../types/index.js";

/**
 * Counts occurrences of every non-empty value.
 *
 * @pure true
 * @complexity O(n)
 */
export function buildTally(values: Iterable<string>): Tally {
	const counts = new Map<string, number>();
	for (const value of values) {
		if (value.length === 0) continue;
		counts.set(value, (counts.get(value) ?? 0) + 1);
	}
	return counts;
}

/**
 * Keys of a tally ordered by descending count. Equal counts are ordered
 * lexicographically so the result does not depend on insertion order.
 * The empty key is never returned.
 *
 * @pure true
 * @complexity O(k log k)
 *
 * @example
 * ```ts
 * sortTallyDesc(new Map([["foo", 3], ["bar", 4], ["baz", 1], ["quz", 2], ["", 10]]));
 * // => ["bar", "foo", "quz", "baz"]
 * ```
 */
export function sortTallyDesc(tally: Tally): readonly string[] {
	const keys = [...tally.keys()].filter((key) => key.length > 0);
	return keys.sort((a, b) => {
		const diff = (tally.get(b) ?? 0) - (tally.get(a) ?? 0);
		if (diff !== 0) return diff;
		if (a === b) return 0;
		return a < b ? -1 : 1;
	});
}

/**
 * Most frequent non-empty key, if any.
 *
 * @pure true
 */
export function majorityOf(tally: Tally): Option.Option<string> {
	return Option.fromNullable(sortTallyDesc(tally)[0]);
}

/**
 * Majority copyright and license across all parsed files.
 *
 * Copyright is checked first, so a tree with neither field fails on copyright.
 *
 * @pure true
 * @complexity O(n + k log k)
 */
export function computeConsensus(
	files: readonly SourceFile[],
): Either.Either<Consensus, NoConsensus> {
	const copyright = majorityOf(buildTally(files.map((f) => f.copyright)));
	if (Option.isNone(copyright)) {
		return Either.left(new NoConsensus({ field: "copyright" }));
	}
	return pipe(
		majorityOf(buildTally(files.map((f) => f.license))),
		Either.fromOption(() => new NoConsensus({ field: "license" })),
		Either.map((license) => ({ copyright: copyright.value, license })),
	);
}
