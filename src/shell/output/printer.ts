// CHANGE: Print census results through an OutputSink
// WHY: Per-file diagnostics and the suggested header are the tool's whole user interface
// PURITY: SHELL
// EFFECT: Effect<void>
// INVARIANT: stdout receives only the suggested header lines
// COMPLEXITY: O(n) where n = |entries|

import { Effect } from "effect";

import {
	formatModifiedMarker,
	formatViolation,
	SUGGESTION_BANNER,
	suggestedHeader,
} from "../../core/report/violations.js";
import type {
	CensusReport,
	Consensus,
	OutputSink,
} from "../../core/types/index.js";

/**
 * Violation lines (verbose only) and an `M <path>` marker per file needing update.
 */
export function printEntries(
	report: CensusReport,
	verbose: boolean,
	sink: OutputSink,
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const { file, violations } of report.entries) {
			if (violations.length === 0) continue;
			if (verbose) {
				for (const violation of violations) {
					sink.stderr(formatViolation(file.path, violation));
				}
			}
			sink.stderr(formatModifiedMarker(file.path));
		}
	});
}

/**
 * Banner on stderr followed by the header lines on stdout. Prints nothing
 * when no file violates.
 */
export function printSuggestion(
	report: CensusReport,
	consensus: Consensus,
	sink: OutputSink,
): Effect.Effect<void> {
	return Effect.sync(() => {
		const lines = suggestedHeader(report, consensus);
		if (lines.length === 0) return;
		sink.stderr("");
		sink.stderr(SUGGESTION_BANNER);
		for (const line of lines) sink.stdout(line);
	});
}

/**
 * `Rewrote <n> file(s)` on stderr after update mode.
 */
export function printRewriteSummary(
	rewritten: readonly string[],
	sink: OutputSink,
): Effect.Effect<void> {
	return Effect.sync(() => {
		sink.stderr(`Rewrote ${rewritten.length} file(s)`);
	});
}
