// CHANGE: Load bundled heuristic tables from data/*.json
// WHY: Language and filter tables are data, decoded once per run
// PURITY: SHELL
// EFFECT: Effect<LanguageTable | FilterPatterns, ConfigError>
// INVARIANT: Tables are resolved beside the package, independent of cwd

import { Effect, Schema } from "effect";

import type { FilterPatterns, LanguageTable } from "../../core/types/index.js";
import type { ConfigError } from "../../core/errors.js";
import { decodeJsonFile } from "../config/decode.js";
import { fileURLToPath, path } from "../utils/node-mods.js";

const StringTable = Schema.Record({ key: Schema.String, value: Schema.String });

export const LanguageTableSchema = Schema.Struct({
	extensions: StringTable,
	filenames: StringTable,
	interpreters: StringTable,
});

export const FilterPatternsSchema = Schema.Struct({
	configurationExtensions: Schema.Array(Schema.String),
	imageExtensions: Schema.Array(Schema.String),
	documentationPatterns: Schema.Array(Schema.String),
	vendorPatterns: Schema.Array(Schema.String),
});

/**
 * Directory holding the bundled tables. Both src/shell/data and
 * dist/shell/data sit three levels below the package root.
 */
export const DATA_DIR = path.resolve(
	path.dirname(fileURLToPath(import.meta.url)),
	"../../../data",
);

export function loadLanguageTable(
	dataDir: string = DATA_DIR,
): Effect.Effect<LanguageTable, ConfigError> {
	return decodeJsonFile(LanguageTableSchema, path.join(dataDir, "languages.json"));
}

export function loadFilterPatterns(
	dataDir: string = DATA_DIR,
): Effect.Effect<FilterPatterns, ConfigError> {
	return decodeJsonFile(FilterPatternsSchema, path.join(dataDir, "filters.json"));
}
