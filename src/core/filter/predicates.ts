// CHANGE: Pure exclusion heuristics over root-relative paths and file bytes
// WHY: The shell composes these with IO-bound checks; the rules themselves stay data-driven and testable
// PURITY: CORE
// INVARIANT: Predicates are total; paths use "/" separators
// COMPLEXITY: O(p) per path where p = |patterns|

import { extensionOf } from "../language/classify.js";
import type { FilterPatterns } from "../types/index.js";

/**
 * Leading bytes inspected for binary detection.
 */
export const BINARY_SNIFF_LENGTH = 8000;

/**
 * Path-only heuristics compiled from the filter table.
 */
export interface PathHeuristics {
	readonly isConfiguration: (relativePath: string) => boolean;
	readonly isDocumentation: (relativePath: string) => boolean;
	readonly isDotFile: (relativePath: string) => boolean;
	readonly isImage: (relativePath: string) => boolean;
	readonly isVendor: (relativePath: string) => boolean;
}

function anyMatch(patterns: readonly RegExp[], path: string): boolean {
	return patterns.some((re) => re.test(path));
}

/**
 * Whether the base name starts with a dot.
 *
 * @pure true
 */
export function isDotFile(relativePath: string): boolean {
	const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
	return name.startsWith(".") && name !== "." && name !== "..";
}

/**
 * Content is binary when a NUL byte appears among its first 8000 bytes.
 *
 * @pure true
 * @complexity O(min(n, 8000))
 */
export function isBinaryContent(content: Uint8Array): boolean {
	const limit = Math.min(content.length, BINARY_SNIFF_LENGTH);
	for (let i = 0; i < limit; i++) {
		if (content[i] === 0) return true;
	}
	return false;
}

/**
 * Compiles the filter table into path predicates.
 *
 * @throws SyntaxError when a pattern is not a valid regular expression
 * @pure true
 */
export function compilePathHeuristics(patterns: FilterPatterns): PathHeuristics {
	const configuration = new Set(
		patterns.configurationExtensions.map((e) => e.toLowerCase()),
	);
	const images = new Set(patterns.imageExtensions.map((e) => e.toLowerCase()));
	const documentation = patterns.documentationPatterns.map(
		(source) => new RegExp(source, "u"),
	);
	const vendor = patterns.vendorPatterns.map((source) => new RegExp(source, "u"));

	return {
		isConfiguration: (p) => configuration.has(extensionOf(p)),
		isDocumentation: (p) => anyMatch(documentation, p),
		isDotFile,
		isImage: (p) => images.has(extensionOf(p)),
		isVendor: (p) => anyMatch(vendor, p),
	};
}
