// CHANGE: Apply the consensus header to violating files (update mode)
// WHY: -w promises in-place correction of missing and minority notices
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, FSError>
// INVARIANT: Only files with violations are touched; unchanged content is not rewritten; invalid UTF-8 aborts before any write
// COMPLEXITY: O(Σ |file|) over violating files

import { Effect } from "effect";

import { FSError, messageOf } from "../../core/errors.js";
import { rewriteHeader } from "../../core/header/rewrite.js";
import type { CensusReport, Consensus } from "../../core/types/index.js";
import { fsPromises, path } from "../utils/node-mods.js";

interface PlannedWrite {
	readonly absolutePath: string;
	readonly displayPath: string;
	readonly content: string;
}

/**
 * Strict UTF-8 decoding; the byte-order mark stays in the text so that
 * re-encoding reproduces every byte outside the rewritten lines.
 */
function decodeUtf8(
	bytes: Uint8Array,
	displayPath: string,
): Effect.Effect<string, FSError> {
	return Effect.try({
		try: () =>
			new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes),
		catch: (error) =>
			new FSError({
				detail: `not valid UTF-8, left unchanged (${messageOf(error)})`,
				path: displayPath,
			}),
	});
}

/**
 * Rewrites every file needing update and returns their display paths.
 *
 * All files are read and rewritten in memory first; nothing is written when
 * any of them fails to read or decode.
 *
 * @param root - Scan root the entries' relative paths are based on
 */
export function applyRewrites(
	root: string,
	report: CensusReport,
	consensus: Consensus,
	headerLines: number,
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const planned: PlannedWrite[] = [];
		for (const { file, violations } of report.entries) {
			if (violations.length === 0) continue;
			const absolutePath = path.resolve(root, file.relativePath);
			const bytes = yield* Effect.tryPromise({
				try: () => fsPromises.readFile(absolutePath),
				catch: (error) => new FSError({ detail: messageOf(error), path: file.path }),
			});
			const content = yield* decodeUtf8(bytes, file.path);
			const updated = rewriteHeader(content, {
				commentPrefix: file.commentPrefix,
				consensus,
				headerLines,
			});
			if (updated === content) continue;
			planned.push({ absolutePath, displayPath: file.path, content: updated });
		}

		const rewritten: string[] = [];
		for (const write of planned) {
			yield* Effect.tryPromise({
				try: () => fsPromises.writeFile(write.absolutePath, write.content, "utf8"),
				catch: (error) =>
					new FSError({ detail: messageOf(error), path: write.displayPath }),
			});
			rewritten.push(write.displayPath);
		}
		return rewritten;
	});
}
