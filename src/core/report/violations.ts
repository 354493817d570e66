// CHANGE: Per-file evaluation against the consensus and report rendering
// WHY: Reporter output is a pure function of the parsed files and the majority values
// FORMAT THEOREM: ∀f: |evaluateFile(f, c)| = [f.copyright ≠ c.copyright] + [f.license ≠ c.license]
// PURITY: CORE
// INVARIANT: Entries keep scan order; prefixTally counts each violating file once
// COMPLEXITY: O(n) where n = |files|

import { Option } from "effect";
import { match } from "ts-pattern";

import { buildTally, majorityOf } from "../tally/majority.js";
import type {
	CensusEntry,
	CensusReport,
	Consensus,
	SourceFile,
	Violation,
} from "../types/index.js";

export const SUGGESTION_BANNER =
	"^^^ These files should contain these comments at the top:";

/**
 * Violations of one file: copyright first, then license.
 *
 * @pure true
 */
export function evaluateFile(
	file: SourceFile,
	consensus: Consensus,
): readonly Violation[] {
	const violations: Violation[] = [];
	if (file.copyright.length === 0) {
		violations.push({ kind: "missing-copyright" });
	} else if (file.copyright !== consensus.copyright) {
		violations.push({
			kind: "minority-copyright",
			want: consensus.copyright,
			got: file.copyright,
		});
	}
	if (file.license.length === 0) {
		violations.push({ kind: "missing-license" });
	} else if (file.license !== consensus.license) {
		violations.push({
			kind: "minority-license",
			want: consensus.license,
			got: file.license,
		});
	}
	return violations;
}

/**
 * Evaluates every file and tallies comment prefixes of files needing update.
 *
 * @pure true
 */
export function buildCensusReport(
	files: readonly SourceFile[],
	consensus: Consensus,
): CensusReport {
	const entries: CensusEntry[] = files.map((file) => ({
		file,
		violations: evaluateFile(file, consensus),
	}));
	const needsUpdate = entries.filter((e) => e.violations.length > 0);
	return {
		entries,
		prefixTally: buildTally(needsUpdate.map((e) => e.file.commentPrefix)),
		violationCount: entries.reduce((sum, e) => sum + e.violations.length, 0),
	};
}

/**
 * Human-readable explanation, without the file path.
 *
 * @pure true
 */
export function describeViolation(violation: Violation): string {
	return match(violation)
		.with({ kind: "missing-copyright" }, () => "is missing the copyright notice")
		.with(
			{ kind: "minority-copyright" },
			(v) =>
				`has minority copyright notice: want: ${JSON.stringify(v.want)}, got: ${JSON.stringify(v.got)}`,
		)
		.with({ kind: "missing-license" }, () => "is missing the license identifier")
		.with(
			{ kind: "minority-license" },
			(v) =>
				`has minority license identifier: want: ${JSON.stringify(v.want)}, got: ${JSON.stringify(v.got)}`,
		)
		.exhaustive();
}

/**
 * Diagnostic line for one violation, e.g.
 * `file "src/a.ts" is missing the copyright notice`.
 *
 * @pure true
 */
export function formatViolation(path: string, violation: Violation): string {
	return `file ${JSON.stringify(path)} ${describeViolation(violation)}`;
}

/**
 * Marker line for a file that needs update.
 *
 * @pure true
 */
export function formatModifiedMarker(path: string): string {
	return `M ${path}`;
}

/**
 * Header lines the violating files should start with, using the most
 * frequent comment prefix among them. Empty when nothing violates.
 *
 * @pure true
 */
export function suggestedHeader(
	report: CensusReport,
	consensus: Consensus,
): readonly string[] {
	return Option.match(majorityOf(report.prefixTally), {
		onNone: () => [],
		onSome: (prefix) => [
			`${prefix} ${consensus.copyright}`,
			`${prefix} ${consensus.license}`,
		],
	});
}
