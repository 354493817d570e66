// CHANGE: Application layer orchestration of one census run
// WHY: APP composes pure CORE logic with SHELL integrations; returns values, never exits
// PURITY: APP
// EFFECT: Effect<CensusOutcome, CensusError>
// INVARIANT: Crawl → filter → parse → consensus → report/update, sequentially
// COMPLEXITY: O(n) where n = files under the root (plus O(k log k) for the majority sort)

import { Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import {
	type ConfigError,
	describeError,
	type FSError,
	type IgnoreSpecError,
	type NoConsensus,
} from "../core/errors.js";
import { compilePathHeuristics } from "../core/filter/predicates.js";
import {
	createHeuristicClassifier,
	type LanguageClassifier,
} from "../core/language/classify.js";
import type { ExitCode } from "../core/models.js";
import { buildCensusReport } from "../core/report/violations.js";
import { computeConsensus } from "../core/tally/majority.js";
import type {
	CensusConfig,
	CensusReport,
	CLIOptions,
	Consensus,
	OutputSink,
	SourceFile,
} from "../core/types/index.js";
import { loadCensusConfig } from "../shell/config/index.js";
import { loadFilterPatterns, loadLanguageTable } from "../shell/data/tables.js";
import { loadIgnoreSpec } from "../shell/filter/ignore-spec.js";
import {
	buildExclusionPredicates,
	isExcluded,
} from "../shell/filter/exclusion.js";
import { crawlFiles } from "../shell/fs/crawler.js";
import {
	printEntries,
	printRewriteSummary,
	printSuggestion,
} from "../shell/output/printer.js";
import { applyRewrites } from "../shell/output/rewriter.js";
import { consoleSink } from "../shell/output/sink.js";
import { parseSourceFile } from "../shell/parser/file-parser.js";

/**
 * Fatal errors of a run. UnknownLanguage never escapes: such files are skipped.
 */
export type CensusError = FSError | IgnoreSpecError | ConfigError | NoConsensus;

export interface CensusRunOptions {
	readonly root: string;
	readonly update: boolean;
	readonly verbose: boolean;
	/** Replaces the bundled heuristic classifier. */
	readonly classifier?: LanguageClassifier;
	readonly sink?: OutputSink;
}

export interface CensusOutcome {
	readonly files: readonly SourceFile[];
	readonly consensus: Consensus;
	readonly report: CensusReport;
	readonly rewritten: readonly string[];
}

/**
 * Crawls, filters and parses the tree into source files.
 *
 * @effect Effect<readonly SourceFile[], CensusError>
 */
export function collectSourceFiles(
	options: Pick<CensusRunOptions, "root" | "classifier">,
	config: CensusConfig,
): Effect.Effect<readonly SourceFile[], CensusError> {
	return Effect.gen(function* () {
		const classifier =
			options.classifier === undefined
				? createHeuristicClassifier(yield* loadLanguageTable())
				: options.classifier;
		const patterns = yield* loadFilterPatterns();
		const ignoreSpec = yield* loadIgnoreSpec(options.root);
		const predicates = buildExclusionPredicates(
			compilePathHeuristics(patterns),
			ignoreSpec,
		);
		const context = {
			classifier,
			commentPrefixes: config.commentPrefixes,
			headerLines: config.headerLines,
		};

		const files: SourceFile[] = [];
		for (const candidate of yield* crawlFiles(options.root)) {
			if (yield* isExcluded(candidate, predicates)) continue;
			const parsed = yield* parseSourceFile(candidate, context).pipe(
				Effect.catchTag("UnknownLanguage", () => Effect.succeed(null)),
			);
			if (parsed !== null) files.push(parsed);
		}
		return files;
	});
}

/**
 * Runs one census: computes the consensus, prints diagnostics and either the
 * suggested header (report mode) or rewrites the violating files (update mode).
 *
 * @pure false (filesystem reads, optional writes, sink output)
 * @effect Effect<CensusOutcome, CensusError>
 */
export function runCensus(
	options: CensusRunOptions,
): Effect.Effect<CensusOutcome, CensusError> {
	const sink = options.sink ?? consoleSink;
	return Effect.gen(function* () {
		const config = yield* loadCensusConfig(options.root);
		const files = yield* collectSourceFiles(options, config);
		const consensus = yield* computeConsensus(files);
		const report = buildCensusReport(files, consensus);

		yield* printEntries(report, options.verbose, sink);

		if (!options.update) {
			yield* printSuggestion(report, consensus, sink);
			return { files, consensus, report, rewritten: [] };
		}

		const rewritten = yield* applyRewrites(
			options.root,
			report,
			consensus,
			config.headerLines,
		);
		yield* printRewriteSummary(rewritten, sink);
		return { files, consensus, report, rewritten };
	});
}

/**
 * CLI-facing run: fatal errors are reported on stderr and mapped to exit code 1.
 *
 * @effect Effect<ExitCode, never>
 * @invariant ExitCode ∈ {0,1}
 */
export function runCensusCli(
	cli: CLIOptions,
	sink: OutputSink = consoleSink,
): Effect.Effect<ExitCode> {
	return runCensus({
		root: cli.targetPath,
		update: cli.update,
		verbose: cli.verbose,
		sink,
	}).pipe(
		Effect.map((outcome) =>
			computeExitCode({
				fatal: false,
				hasViolations: outcome.report.violationCount > 0 && !cli.update,
				failOnViolations: cli.check,
			}),
		),
		Effect.catchAll((error) =>
			Effect.sync(() => {
				sink.stderr(`Fatal error: ${describeError(error)}`);
				return computeExitCode({
					fatal: true,
					hasViolations: false,
					failOnViolations: cli.check,
				});
			}),
		),
	);
}
