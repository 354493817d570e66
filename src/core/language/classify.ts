// CHANGE: Heuristic language classification and comment-prefix resolution
// WHY: The parser needs the single-line comment token of each file; detection is an injected capability
// FORMAT THEOREM: resolveCommentPrefix(l, p, t) = Right(t[l]) ↔ l ∈ dom(t), else Left(UnknownLanguage)
// PURITY: CORE
// INVARIANT: classify(path, content) = "" when no heuristic applies
// COMPLEXITY: O(1) lookups + O(k) shebang scan where k = |first line|

import { Either } from "effect";

import { UnknownLanguage } from "../errors.js";
import type { CommentPrefixTable, LanguageTable } from "../types/index.js";

/**
 * Maps a file to a language id. An empty string means "unknown".
 *
 * Implementations may inspect the path, the content, or both.
 */
export interface LanguageClassifier {
	readonly classify: (path: string, content: Uint8Array) => string;
}

/**
 * Language of the tool's own sources; the only one enabled by default.
 */
export const DEFAULT_COMMENT_PREFIXES: CommentPrefixTable = {
	TypeScript: "//",
};

const SHEBANG_SCAN_LIMIT = 256;

function baseName(path: string): string {
	const normalized = path.replace(/\\/g, "/");
	return normalized.slice(normalized.lastIndexOf("/") + 1);
}

/**
 * Lowercased extension including the dot, "" when there is none.
 * A leading dot (".bashrc") is not an extension.
 *
 * @pure true
 */
export function extensionOf(path: string): string {
	const name = baseName(path);
	const dot = name.lastIndexOf(".");
	if (dot <= 0) return "";
	return name.slice(dot).toLowerCase();
}

/**
 * Interpreter named by a `#!` first line, e.g. "node" for
 * `#!/usr/bin/env node` or "deno" for `#!/usr/bin/env -S deno run`.
 *
 * @pure true
 */
export function shebangInterpreter(content: Uint8Array): string {
	if (content[0] !== 0x23 || content[1] !== 0x21) return "";
	const head = content.subarray(0, SHEBANG_SCAN_LIMIT);
	const firstLine = new TextDecoder().decode(head).split("\n")[0] ?? "";
	const words = firstLine
		.slice(2)
		.trim()
		.split(/\s+/u)
		.filter((w) => w.length > 0);

	const program = baseName(words[0] ?? "");
	if (program !== "env") return program;
	const args = words.slice(1).filter((w) => !w.startsWith("-"));
	return baseName(args[0] ?? "");
}

/**
 * Builds the default classifier: shebang interpreter, then exact file name,
 * then extension.
 *
 * @pure true
 */
export function createHeuristicClassifier(
	table: LanguageTable,
): LanguageClassifier {
	return {
		classify: (path, content) => {
			const interpreter = shebangInterpreter(content);
			const byInterpreter = table.interpreters[interpreter];
			if (interpreter.length > 0 && byInterpreter !== undefined) {
				return byInterpreter;
			}
			const byName = table.filenames[baseName(path)];
			if (byName !== undefined) return byName;
			return table.extensions[extensionOf(path)] ?? "";
		},
	};
}

/**
 * Comment prefix configured for a language.
 *
 * @returns Left(UnknownLanguage) when the language is empty or not configured
 * @pure true
 */
export function resolveCommentPrefix(
	language: string,
	path: string,
	prefixes: CommentPrefixTable,
): Either.Either<string, UnknownLanguage> {
	const prefix = language.length > 0 ? prefixes[language] : undefined;
	return prefix === undefined
		? Either.left(new UnknownLanguage({ language, path }))
		: Either.right(prefix);
}
