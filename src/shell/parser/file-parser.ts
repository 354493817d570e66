// CHANGE: Parse one candidate file into a SourceFile
// WHY: Connects classification, the bounded line reader and pure field extraction
// PURITY: SHELL
// EFFECT: Effect<SourceFile, UnknownLanguage | FSError>
// INVARIANT: UnknownLanguage stays distinct from IO failures so callers can skip the file
// COMPLEXITY: O(n) for classification read + O(k) for the header lines

import { Effect, Either } from "effect";

import { FSError, messageOf, type UnknownLanguage } from "../../core/errors.js";
import { extractHeaderFields } from "../../core/header/fields.js";
import {
	type LanguageClassifier,
	resolveCommentPrefix,
} from "../../core/language/classify.js";
import type {
	CandidatePath,
	CommentPrefixTable,
	SourceFile,
} from "../../core/types/index.js";
import { readHeadLines } from "../fs/line-reader.js";
import { fsPromises } from "../utils/node-mods.js";

export interface ParseContext {
	readonly classifier: LanguageClassifier;
	readonly commentPrefixes: CommentPrefixTable;
	readonly headerLines: number;
}

/**
 * Comment prefix of a file, from its path and full content.
 *
 * @effect Effect<string, UnknownLanguage | FSError>
 */
export function commentPrefixOf(
	candidate: CandidatePath,
	context: ParseContext,
): Effect.Effect<string, UnknownLanguage | FSError> {
	return Effect.gen(function* () {
		const content = yield* Effect.tryPromise({
			try: () => fsPromises.readFile(candidate.absolutePath),
			catch: (error) =>
				new FSError({ detail: messageOf(error), path: candidate.displayPath }),
		});
		const language = context.classifier.classify(candidate.relativePath, content);
		const resolved = resolveCommentPrefix(
			language,
			candidate.displayPath,
			context.commentPrefixes,
		);
		if (Either.isLeft(resolved)) return yield* Effect.fail(resolved.left);
		return resolved.right;
	});
}

/**
 * Classifies a file and extracts its copyright and license notices from the
 * first `headerLines` lines.
 *
 * @effect Effect<SourceFile, UnknownLanguage | FSError>
 */
export function parseSourceFile(
	candidate: CandidatePath,
	context: ParseContext,
): Effect.Effect<SourceFile, UnknownLanguage | FSError> {
	return Effect.gen(function* () {
		const commentPrefix = yield* commentPrefixOf(candidate, context);
		const lines = yield* readHeadLines(candidate.absolutePath, context.headerLines);
		const fields = extractHeaderFields(lines, commentPrefix);
		return {
			path: candidate.displayPath,
			relativePath: candidate.relativePath,
			commentPrefix,
			...fields,
		};
	});
}
