// CHANGE: Central export file for all type definitions
// WHY: Single import point for types used across modules

export type {
	CensusConfig,
	CLIOptions,
	CommentPrefixTable,
	FilterPatterns,
	LanguageTable,
} from "./config.js";
export type {
	CandidatePath,
	CensusEntry,
	CensusReport,
	Consensus,
	HeaderFields,
	SourceFile,
	Tally,
	Violation,
} from "./header.js";
export type { OutputSink } from "./output.js";
