// CHANGE: Header census domain types
// WHY: Immutable records flow from the parser through the aggregator to the reporter
// PURITY: CORE
// INVARIANT: No entity is mutated after construction
// COMPLEXITY: O(1) - type declarations only

/**
 * A file found by the crawler.
 *
 * @property absolutePath Path usable for IO
 * @property relativePath Root-relative path with "/" separators
 * @property displayPath Scan root joined with relativePath, as reported to the user
 */
export interface CandidatePath {
	readonly absolutePath: string;
	readonly relativePath: string;
	readonly displayPath: string;
}

/**
 * Header fields of one scanned file.
 *
 * `copyright` and `license` hold the comment line after the prefix and one
 * space ("Copyright 2024 Example Corp", "SPDX-License-Identifier: MIT"),
 * or "" when the marker is absent.
 */
export interface SourceFile {
	readonly path: string;
	readonly relativePath: string;
	readonly commentPrefix: string;
	readonly copyright: string;
	readonly license: string;
}

export interface HeaderFields {
	readonly copyright: string;
	readonly license: string;
}

/**
 * Value → number of files sharing it.
 *
 * @invariant ∀ count ∈ values: count ∈ ℕ
 */
export type Tally = ReadonlyMap<string, number>;

/**
 * Majority copyright and license across the tree.
 */
export interface Consensus {
	readonly copyright: string;
	readonly license: string;
}

export type Violation =
	| { readonly kind: "missing-copyright" }
	| {
			readonly kind: "minority-copyright";
			readonly want: string;
			readonly got: string;
	  }
	| { readonly kind: "missing-license" }
	| {
			readonly kind: "minority-license";
			readonly want: string;
			readonly got: string;
	  };

export interface CensusEntry {
	readonly file: SourceFile;
	readonly violations: ReadonlyArray<Violation>;
}

/**
 * Per-file evaluation against the consensus.
 *
 * @property entries One entry per source file, in scan order
 * @property prefixTally Comment prefixes of files needing update
 * @property violationCount Σ |entry.violations|
 */
export interface CensusReport {
	readonly entries: ReadonlyArray<CensusEntry>;
	readonly prefixTally: Tally;
	readonly violationCount: number;
}
