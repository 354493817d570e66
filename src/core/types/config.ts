// CHANGE: Configuration type definitions for the census run
// WHY: CLI options, config file and data tables share one typed vocabulary
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

/**
 * Command-line options.
 *
 * @property targetPath Root directory to scan
 * @property update Rewrite violating files in place (-w)
 * @property verbose Print one diagnostic line per violation (-v)
 * @property check Exit with 1 when violations remain in report mode
 * @property help Print usage and exit
 * @property unknownFlags Options that were not recognized
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly update: boolean;
	readonly verbose: boolean;
	readonly check: boolean;
	readonly help: boolean;
	readonly unknownFlags: ReadonlyArray<string>;
}

/**
 * Language id → single-line comment token.
 */
export type CommentPrefixTable = Readonly<Record<string, string>>;

/**
 * Settings read from header-census.config.json at the scan root.
 *
 * @property headerLines How many leading lines are scanned for notices
 * @property commentPrefixes Languages the census understands
 */
export interface CensusConfig {
	readonly headerLines: number;
	readonly commentPrefixes: CommentPrefixTable;
}

/**
 * Heuristic classification table (data/languages.json).
 *
 * @property extensions Lowercased extension (".ts") → language
 * @property filenames Exact base name ("Makefile") → language
 * @property interpreters Shebang interpreter ("node") → language
 */
export interface LanguageTable {
	readonly extensions: Readonly<Record<string, string>>;
	readonly filenames: Readonly<Record<string, string>>;
	readonly interpreters: Readonly<Record<string, string>>;
}

/**
 * Exclusion heuristics (data/filters.json). Pattern entries are
 * regular-expression sources matched against the root-relative POSIX path.
 */
export interface FilterPatterns {
	readonly configurationExtensions: ReadonlyArray<string>;
	readonly imageExtensions: ReadonlyArray<string>;
	readonly documentationPatterns: ReadonlyArray<string>;
	readonly vendorPatterns: ReadonlyArray<string>;
}
