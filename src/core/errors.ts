// CHANGE: Typed domain error ADT for the census pipeline using Effect.Data
// WHY: Errors travel as values in Effect signatures, discriminated by `_tag`
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * File language could not be mapped to a single-line comment prefix.
 *
 * Recoverable: the pipeline skips the file and keeps scanning.
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 */
export class UnknownLanguage extends Data.TaggedError("UnknownLanguage")<{
	readonly language: string;
	readonly path: string;
}> {}

/**
 * Filesystem operation error (walk, open, read, write)
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Ignore file at the scan root is missing or unreadable.
 */
export class IgnoreSpecError extends Data.TaggedError("IgnoreSpec")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Config file or bundled data table failed to load or decode.
 */
export class ConfigError extends Data.TaggedError("Config")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * No file in the tree carries a value for the given header field,
 * so there is no majority to compare against.
 *
 * @invariant field ∈ {"copyright", "license"}
 */
export class NoConsensus extends Data.TaggedError("NoConsensus")<{
	readonly field: "copyright" | "license";
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| UnknownLanguage
	| FSError
	| IgnoreSpecError
	| ConfigError
	| NoConsensus;

/**
 * Renders an application error as a single diagnostic line.
 *
 * @pure true
 * @invariant ∀ e ∈ AppError: describeError(e).length > 0
 * @complexity O(1)
 */
export function describeError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "UnknownLanguage" },
			(e) =>
				`unknown language ${JSON.stringify(e.language)} for ${JSON.stringify(e.path)}`,
		)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? e.detail : `${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "IgnoreSpec" },
			(e) => `cannot load ignore file ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "Config" }, (e) => `invalid configuration ${e.path}: ${e.detail}`)
		.with({ _tag: "NoConsensus", field: "copyright" }, () =>
			"cannot find any copyright notice in any source file",
		)
		.with({ _tag: "NoConsensus", field: "license" }, () =>
			"cannot find any SPDX-License-Identifier tag in any source file",
		)
		.exhaustive();
}

/**
 * Extracts a message from an unknown thrown value.
 *
 * @pure true
 */
export function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
