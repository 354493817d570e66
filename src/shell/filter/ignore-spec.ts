// CHANGE: Load the version-control ignore file from the scan root
// WHY: Ignore patterns are one of the exclusion predicates; a missing file aborts the run
// PURITY: SHELL
// EFFECT: Effect<IgnoreSpec, IgnoreSpecError>
// COMPLEXITY: O(n) where n = ignore file size

import { Effect, pipe } from "effect";

import { IgnoreSpecError, messageOf } from "../../core/errors.js";
import { type IgnoreSpec, parseIgnoreSpec } from "../../core/filter/ignore-rules.js";
import { fsPromises, path } from "../utils/node-mods.js";

export const IGNORE_FILE_NAME = ".gitignore";

/**
 * Reads and compiles `<root>/.gitignore`.
 *
 * @effect Effect<IgnoreSpec, IgnoreSpecError>
 */
export function loadIgnoreSpec(
	root: string,
): Effect.Effect<IgnoreSpec, IgnoreSpecError> {
	const filePath = path.join(root, IGNORE_FILE_NAME);
	return pipe(
		Effect.tryPromise({
			try: () => fsPromises.readFile(filePath, "utf8"),
			catch: (error) =>
				new IgnoreSpecError({ path: filePath, detail: messageOf(error) }),
		}),
		Effect.flatMap((content) =>
			Effect.try({
				try: () => parseIgnoreSpec(content, filePath),
				catch: (error) =>
					new IgnoreSpecError({ path: filePath, detail: messageOf(error) }),
			}),
		),
	);
}
