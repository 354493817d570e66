// CHANGE: Bounded head-of-file line reader
// WHY: Only the leading comment block matters; large files are never read past the bound
// FORMAT THEOREM: |readHeadLines(p, n)| = min(n, lines(p))
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, FSError>
// INVARIANT: Lines have trailing " \t\r\n" stripped; a final unterminated line is kept
// COMPLEXITY: O(k) where k = bytes up to line n

import { Effect } from "effect";

import { FSError, messageOf } from "../../core/errors.js";
import { trimLineEnd } from "../../core/header/fields.js";
import { fsPromises } from "../utils/node-mods.js";

const CHUNK_SIZE = 4096;

/**
 * Reads up to `maxLines` lines from the start of a file.
 *
 * Stops reading as soon as the bound is reached. On a read error no partial
 * result is returned.
 *
 * @effect Effect<readonly string[], FSError>
 */
export function readHeadLines(
	filePath: string,
	maxLines: number,
): Effect.Effect<readonly string[], FSError> {
	return Effect.tryPromise({
		try: async () => {
			const lines: string[] = [];
			if (maxLines <= 0) return lines;
			const handle = await fsPromises.open(filePath, "r");
			try {
				const decoder = new TextDecoder("utf-8");
				const chunk = new Uint8Array(CHUNK_SIZE);
				let pending = "";
				while (lines.length < maxLines) {
					const { bytesRead } = await handle.read(chunk, 0, chunk.length, null);
					if (bytesRead === 0) {
						pending += decoder.decode();
						if (pending.length > 0) lines.push(trimLineEnd(pending));
						break;
					}
					pending += decoder.decode(chunk.subarray(0, bytesRead), {
						stream: true,
					});
					let newline = pending.indexOf("\n");
					while (newline >= 0 && lines.length < maxLines) {
						lines.push(trimLineEnd(pending.slice(0, newline)));
						pending = pending.slice(newline + 1);
						newline = pending.indexOf("\n");
					}
				}
			} finally {
				await handle.close();
			}
			return lines;
		},
		catch: (error) => new FSError({ detail: messageOf(error), path: filePath }),
	});
}
