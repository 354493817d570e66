// CHANGE: Recursive tree crawler producing candidate paths
// WHY: Exclusion and parsing operate on a flat, deterministic list of files
// FORMAT THEOREM: crawl(root) = { f reachable from root | f not a directory ∧ no ancestor named .git }
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<CandidatePath>, FSError>
// INVARIANT: Dir entries visited in code-unit order; every file listed exactly once
// COMPLEXITY: O(n log n) where n = entries under root

import { Effect } from "effect";

import { FSError, messageOf } from "../../core/errors.js";
import type { CandidatePath } from "../../core/types/index.js";
import { fsPromises, path } from "../utils/node-mods.js";

/**
 * Version-control metadata directory, never descended into.
 */
export const VCS_DIRECTORY = ".git";

function joinRelative(base: string, name: string): string {
	if (base.length === 0) return name;
	return `${base}/${name}`;
}

function fsError(error: unknown, at: string): FSError {
	return new FSError({ detail: messageOf(error), path: at });
}

/**
 * Symlinks are listed when they resolve to a regular file; links to
 * directories and dangling links are skipped.
 */
function isLinkToFile(absolutePath: string): Effect.Effect<boolean> {
	return Effect.tryPromise(() => fsPromises.stat(absolutePath)).pipe(
		Effect.map((stats) => stats.isFile()),
		Effect.orElseSucceed(() => false),
	);
}

function walkDirectory(
	root: string,
	absoluteDir: string,
	relativeBase: string,
): Effect.Effect<readonly CandidatePath[], FSError> {
	return Effect.gen(function* () {
		const dirents = yield* Effect.tryPromise({
			try: () => fsPromises.readdir(absoluteDir, { withFileTypes: true }),
			catch: (error) => fsError(error, absoluteDir),
		});
		const sorted = [...dirents].sort((a, b) =>
			a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
		);

		const files: CandidatePath[] = [];
		for (const dirent of sorted) {
			const relativePath = joinRelative(relativeBase, dirent.name);
			const absolutePath = path.join(absoluteDir, dirent.name);

			if (dirent.isDirectory()) {
				if (dirent.name === VCS_DIRECTORY) continue;
				files.push(...(yield* walkDirectory(root, absolutePath, relativePath)));
				continue;
			}

			const listed =
				dirent.isFile() ||
				(dirent.isSymbolicLink() && (yield* isLinkToFile(absolutePath)));
			if (listed) {
				files.push({
					absolutePath,
					relativePath,
					displayPath: path.join(root, relativePath),
				});
			}
		}
		return files;
	});
}

/**
 * Lists every file under `root`, skipping `.git` directories.
 *
 * @param root - Directory to crawl, as given on the command line
 * @returns Candidates whose displayPath is `path.join(root, relativePath)`
 *
 * @effect Effect<readonly CandidatePath[], FSError>
 */
export function crawlFiles(
	root: string,
): Effect.Effect<readonly CandidatePath[], FSError> {
	return walkDirectory(root, path.resolve(root), "");
}
