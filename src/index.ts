// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect descriptions

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Census orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runCensus } from "header-census";
 *
 * const outcome = await Effect.runPromise(
 *   runCensus({ root: "src", update: false, verbose: true }),
 * );
 * console.log(outcome.consensus.license);
 * ```
 */
export {
	type CensusError,
	type CensusOutcome,
	type CensusRunOptions,
	collectSourceFiles,
	runCensus,
	runCensusCli,
} from "./app/runCensus.js";
export { main } from "./main.js";
export { consoleSink, createBufferedSink } from "./shell/output/sink.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { DecisionState, ExitCode } from "./core/models.js";
export type {
	CandidatePath,
	CensusConfig,
	CensusEntry,
	CensusReport,
	CLIOptions,
	CommentPrefixTable,
	Consensus,
	OutputSink,
	SourceFile,
	Tally,
	Violation,
} from "./core/types/index.js";
export {
	type AppError,
	ConfigError,
	describeError,
	FSError,
	IgnoreSpecError,
	NoConsensus,
	UnknownLanguage,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export {
	buildTally,
	computeConsensus,
	majorityOf,
	sortTallyDesc,
} from "./core/tally/majority.js";
export { extractHeaderFields } from "./core/header/fields.js";
export { rewriteHeader } from "./core/header/rewrite.js";
export {
	createHeuristicClassifier,
	DEFAULT_COMMENT_PREFIXES,
	type LanguageClassifier,
	resolveCommentPrefix,
} from "./core/language/classify.js";
export {
	buildCensusReport,
	evaluateFile,
	formatViolation,
	suggestedHeader,
} from "./core/report/violations.js";
