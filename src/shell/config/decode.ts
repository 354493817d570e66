// CHANGE: Read and decode JSON files through effect Schema
// WHY: Config file and bundled data tables share one validated loading path
// PURITY: SHELL
// EFFECT: Effect<A, ConfigError>
// INVARIANT: Any read, parse or shape failure becomes ConfigError with the file path
// COMPLEXITY: O(n) where n = file size

import { Effect, ParseResult, pipe, Schema } from "effect";

import { ConfigError, messageOf } from "../../core/errors.js";
import { fsPromises } from "../utils/node-mods.js";

/**
 * Parses JSON text and decodes it against a schema.
 *
 * @pure true (returns a description of the computation)
 */
export function decodeJsonText<A, I>(
	schema: Schema.Schema<A, I>,
	text: string,
	filePath: string,
): Effect.Effect<A, ConfigError> {
	return pipe(
		Effect.try({
			try: (): unknown => JSON.parse(text),
			catch: (error) =>
				new ConfigError({ path: filePath, detail: messageOf(error) }),
		}),
		Effect.flatMap((json) =>
			pipe(
				Schema.decodeUnknown(schema)(json),
				Effect.mapError(
					(error) =>
						new ConfigError({
							path: filePath,
							detail: ParseResult.TreeFormatter.formatErrorSync(error),
						}),
				),
			),
		),
	);
}

/**
 * Reads a JSON file and decodes it against a schema.
 *
 * @effect Effect<A, ConfigError>
 */
export function decodeJsonFile<A, I>(
	schema: Schema.Schema<A, I>,
	filePath: string,
): Effect.Effect<A, ConfigError> {
	return pipe(
		Effect.tryPromise({
			try: () => fsPromises.readFile(filePath, "utf8"),
			catch: (error) =>
				new ConfigError({ path: filePath, detail: messageOf(error) }),
		}),
		Effect.flatMap((text) => decodeJsonText(schema, text, filePath)),
	);
}
