// CHANGE: Pure in-place header correction for update mode (-w)
// WHY: The majority notice must be written into violating files, not only suggested
// FORMAT THEOREM: ∀c: extractHeaderFields(head(rewriteHeader(c), n), p) = consensus when the notices fit in n lines
// PURITY: CORE
// INVARIANT: Lines outside the rewritten notices are preserved with their own terminators; a leading BOM is kept
// COMPLEXITY: O(n) where n = |content|

import type { Consensus } from "../types/index.js";
import {
	isCopyrightLine,
	isLicenseLine,
	trimLineEnd,
} from "./fields.js";

export interface RewriteOptions {
	readonly commentPrefix: string;
	readonly consensus: Consensus;
	readonly headerLines: number;
}

/**
 * One physical line and its own terminator ("\r\n", "\n", or "" for an
 * unterminated last line).
 */
interface Line {
	readonly text: string;
	readonly eol: string;
}

const BYTE_ORDER_MARK = "\uFEFF";

function splitLines(content: string): Line[] {
	return content.split(/(?<=\n)/u).map((raw) => {
		if (raw.endsWith("\r\n")) return { text: raw.slice(0, -2), eol: "\r\n" };
		if (raw.endsWith("\n")) return { text: raw.slice(0, -1), eol: "\n" };
		return { text: raw, eol: "" };
	});
}

function joinLines(lines: readonly Line[], eol: string): string {
	return lines
		.map((line, i) =>
			line.eol.length === 0 && i < lines.length - 1
				? `${line.text}${eol}`
				: `${line.text}${line.eol}`,
		)
		.join("");
}

function findInHeader(
	lines: readonly Line[],
	limit: number,
	test: (line: string) => boolean,
): number {
	const end = Math.min(limit, lines.length);
	for (let i = 0; i < end; i++) {
		if (test(trimLineEnd(lines[i]?.text ?? ""))) return i;
	}
	return -1;
}

/**
 * Produces file content whose header carries the consensus notices.
 *
 * - a minority notice inside the header window is replaced in place;
 * - a missing copyright goes right before an existing license line, and a
 *   missing license right after an existing copyright line, when both then
 *   stay inside the window;
 * - otherwise both notices go to the top (after a shebang), followed by a
 *   blank line unless one is already there, and a lone notice on the last
 *   window line is moved up with them.
 *
 * Each line keeps its own terminator; inserted lines take the first one found
 * in the file. A leading byte-order mark is kept in front of the result.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * rewriteHeader("export {};\n", {
 *   commentPrefix: "//",
 *   consensus: { copyright: "Copyright 2024 Example Corp", license: "SPDX-License-Identifier: MIT" },
 *   headerLines: 5,
 * });
 * // => "// Copyright 2024 Example Corp\n// SPDX-License-Identifier: MIT\n\nexport {};\n"
 * ```
 */
export function rewriteHeader(content: string, options: RewriteOptions): string {
	const { commentPrefix, consensus, headerLines } = options;
	const bom = content.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK : "";
	const body = content.slice(bom.length);
	const copyrightLine = `${commentPrefix} ${consensus.copyright}`;
	const licenseLine = `${commentPrefix} ${consensus.license}`;

	if (body.length === 0) {
		return `${bom}${copyrightLine}\n${licenseLine}\n`;
	}

	const lines = splitLines(body);
	const eol = lines.find((line) => line.eol.length > 0)?.eol ?? "\n";
	const line = (text: string): Line => ({ text, eol });

	const copyrightAt = findInHeader(lines, headerLines, (l) =>
		isCopyrightLine(l, commentPrefix),
	);
	const licenseAt = findInHeader(lines, headerLines, (l) =>
		isLicenseLine(l, commentPrefix),
	);

	const replace = (at: number, text: string): void => {
		const old = lines[at];
		if (old !== undefined) lines[at] = { text, eol: old.eol };
	};

	if (copyrightAt >= 0 && licenseAt >= 0) {
		replace(copyrightAt, copyrightLine);
		replace(licenseAt, licenseLine);
		return bom + joinLines(lines, eol);
	}
	if (copyrightAt >= 0 && copyrightAt + 1 < headerLines) {
		replace(copyrightAt, copyrightLine);
		lines.splice(copyrightAt + 1, 0, line(licenseLine));
		return bom + joinLines(lines, eol);
	}
	if (licenseAt >= 0 && licenseAt + 1 < headerLines) {
		replace(licenseAt, licenseLine);
		lines.splice(licenseAt, 0, line(copyrightLine));
		return bom + joinLines(lines, eol);
	}

	// The lone notice, if any, sits on the last window line.
	const lone = Math.max(copyrightAt, licenseAt);
	if (lone >= 0) lines.splice(lone, 1);

	const insertAt = (lines[0]?.text ?? "").startsWith("#!") ? 1 : 0;
	const next = lines[insertAt];
	const separated = next !== undefined && trimLineEnd(next.text).length === 0;
	const block = separated
		? [line(copyrightLine), line(licenseLine)]
		: [line(copyrightLine), line(licenseLine), line("")];
	lines.splice(insertAt, 0, ...block);
	return bom + joinLines(lines, eol);
}
