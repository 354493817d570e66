// CHANGE: Load optional header-census.config.json from the scan root
// WHY: Header window and comment-prefix table are per-project settings
// PURITY: SHELL
// EFFECT: Effect<CensusConfig, ConfigError>
// INVARIANT: Missing file ⇒ defaults; present but invalid ⇒ ConfigError
// COMPLEXITY: O(n) where n = config file size

import { Effect, pipe, Schema } from "effect";

import { ConfigError, messageOf } from "../../core/errors.js";
import { DEFAULT_COMMENT_PREFIXES } from "../../core/language/classify.js";
import type { CensusConfig } from "../../core/types/index.js";
import { fsPromises, isNotFound, path } from "../utils/node-mods.js";
import { decodeJsonText } from "./decode.js";

export const CONFIG_FILE_NAME = "header-census.config.json";

/**
 * Number of leading lines scanned for notices unless configured otherwise.
 */
export const DEFAULT_HEADER_LINES = 5;

export const DEFAULT_CONFIG: CensusConfig = {
	headerLines: DEFAULT_HEADER_LINES,
	commentPrefixes: DEFAULT_COMMENT_PREFIXES,
};

export const ConfigFileSchema = Schema.Struct({
	headerLines: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.positive())),
	commentPrefixes: Schema.optional(
		Schema.Record({ key: Schema.String, value: Schema.NonEmptyString }),
	),
});

/**
 * Loads the census configuration for a scan root.
 *
 * @example
 * ```json
 * { "headerLines": 8, "commentPrefixes": { "TypeScript": "//", "Go": "//", "Python": "#" } }
 * ```
 */
export function loadCensusConfig(
	root: string,
): Effect.Effect<CensusConfig, ConfigError> {
	const filePath = path.join(root, CONFIG_FILE_NAME);
	return pipe(
		Effect.tryPromise({
			try: () => fsPromises.readFile(filePath, "utf8"),
			catch: (error) => error,
		}),
		Effect.map((text): string | null => text),
		Effect.catchAll((error) =>
			isNotFound(error)
				? Effect.succeed(null)
				: Effect.fail(new ConfigError({ path: filePath, detail: messageOf(error) })),
		),
		Effect.flatMap((text) =>
			text === null
				? Effect.succeed(DEFAULT_CONFIG)
				: pipe(
						decodeJsonText(ConfigFileSchema, text, filePath),
						Effect.map(
							(file): CensusConfig => ({
								headerLines: file.headerLines ?? DEFAULT_CONFIG.headerLines,
								commentPrefixes:
									file.commentPrefixes ?? DEFAULT_CONFIG.commentPrefixes,
							}),
						),
					),
		),
	);
}
