// CHANGE: Compose exclusion predicates for one run
// WHY: The predicate list is a value built at the start of a run, not shared global state
// FORMAT THEOREM: isExcluded(c, ps) = ∃p ∈ ps: p.test(c)
// PURITY: SHELL (binary detection reads file content)
// EFFECT: Effect<boolean, FSError>
// INVARIANT: Evaluation short-circuits in list order; the boolean result is order-independent
// COMPLEXITY: O(|ps|) per candidate plus one bounded read for binary detection

import { Effect } from "effect";

import { FSError, messageOf } from "../../core/errors.js";
import {
	type IgnoreSpec,
	matchesIgnoreSpec,
} from "../../core/filter/ignore-rules.js";
import {
	BINARY_SNIFF_LENGTH,
	isBinaryContent,
	type PathHeuristics,
} from "../../core/filter/predicates.js";
import type { CandidatePath } from "../../core/types/index.js";
import { fsPromises } from "../utils/node-mods.js";

export interface ExclusionPredicate {
	readonly name: string;
	readonly test: (candidate: CandidatePath) => Effect.Effect<boolean, FSError>;
}

/**
 * Lifts a pure path check into a predicate.
 */
export function pathPredicate(
	name: string,
	check: (relativePath: string) => boolean,
): ExclusionPredicate {
	return {
		name,
		test: (candidate) => Effect.sync(() => check(candidate.relativePath)),
	};
}

/**
 * Reads up to BINARY_SNIFF_LENGTH leading bytes.
 *
 * @effect Effect<Uint8Array, FSError>
 */
export function readLeadingBytes(
	filePath: string,
): Effect.Effect<Uint8Array, FSError> {
	return Effect.tryPromise({
		try: async () => {
			const handle = await fsPromises.open(filePath, "r");
			try {
				const buffer = new Uint8Array(BINARY_SNIFF_LENGTH);
				const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
				return buffer.subarray(0, bytesRead);
			} finally {
				await handle.close();
			}
		},
		catch: (error) => new FSError({ detail: messageOf(error), path: filePath }),
	});
}

/**
 * Binary-content predicate; an unreadable file fails the run.
 */
export const binaryPredicate: ExclusionPredicate = {
	name: "binary",
	test: (candidate) =>
		readLeadingBytes(candidate.absolutePath).pipe(Effect.map(isBinaryContent)),
};

/**
 * Predicate list for a run, cheapest first; binary detection reads the file
 * and therefore runs last.
 */
export function buildExclusionPredicates(
	heuristics: PathHeuristics,
	ignoreSpec: IgnoreSpec,
): readonly ExclusionPredicate[] {
	return [
		pathPredicate("configuration", heuristics.isConfiguration),
		pathPredicate("documentation", heuristics.isDocumentation),
		pathPredicate("dotfile", heuristics.isDotFile),
		pathPredicate("image", heuristics.isImage),
		pathPredicate("vendor", heuristics.isVendor),
		pathPredicate("ignore-spec", (p) => matchesIgnoreSpec(ignoreSpec, p)),
		binaryPredicate,
	];
}

/**
 * Whether any predicate excludes the candidate.
 *
 * @effect Effect<boolean, FSError>
 */
export function isExcluded(
	candidate: CandidatePath,
	predicates: readonly ExclusionPredicate[],
): Effect.Effect<boolean, FSError> {
	return Effect.gen(function* () {
		for (const predicate of predicates) {
			if (yield* predicate.test(candidate)) return true;
		}
		return false;
	});
}
