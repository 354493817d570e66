// CHANGE: Pure extraction of copyright/license notices from header lines
// WHY: Shell reads lines; matching rules stay testable without the filesystem
// FORMAT THEOREM: ∀lines, p: extract(lines, p).copyright = first l ∈ lines with l ⊒ `${p} Copyright ` minus `${p} `, else ""
// PURITY: CORE
// INVARIANT: First occurrence per field wins; absence yields ""
// COMPLEXITY: O(n) where n = |lines|

import type { HeaderFields } from "../types/index.js";

export const COPYRIGHT_MARKER = "Copyright ";
export const LICENSE_MARKER = "SPDX-License-Identifier: ";

/**
 * Full line prefix identifying a notice, e.g. `// Copyright `.
 *
 * @pure true
 */
export function noticePrefix(commentPrefix: string, marker: string): string {
	return `${commentPrefix} ${marker}`;
}

/**
 * Whether a line is a copyright notice for the given comment prefix.
 *
 * @pure true
 */
export function isCopyrightLine(line: string, commentPrefix: string): boolean {
	return line.startsWith(noticePrefix(commentPrefix, COPYRIGHT_MARKER));
}

/**
 * Whether a line is an SPDX license identifier for the given comment prefix.
 *
 * @pure true
 */
export function isLicenseLine(line: string, commentPrefix: string): boolean {
	return line.startsWith(noticePrefix(commentPrefix, LICENSE_MARKER));
}

/**
 * Extracts the copyright and license fields from already-read header lines.
 *
 * @param lines - Leading lines of a file, trailing whitespace stripped
 * @param commentPrefix - Single-line comment token of the file language
 * @returns Fields holding the line after the prefix and one space, or ""
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * extractHeaderFields(["// Copyright 2024 Example Corp"], "//");
 * // => { copyright: "Copyright 2024 Example Corp", license: "" }
 * ```
 */
export function extractHeaderFields(
	lines: readonly string[],
	commentPrefix: string,
): HeaderFields {
	const valueStart = commentPrefix.length + 1;
	let copyright = "";
	let license = "";
	for (const line of lines) {
		if (copyright.length === 0 && isCopyrightLine(line, commentPrefix)) {
			copyright = line.slice(valueStart);
		}
		if (license.length === 0 && isLicenseLine(line, commentPrefix)) {
			license = line.slice(valueStart);
		}
	}
	return { copyright, license };
}

/**
 * Strips trailing spaces, tabs, CR and LF from a raw line.
 *
 * @pure true
 */
export function trimLineEnd(line: string): string {
	return line.replace(/[ \t\r\n]+$/u, "");
}
