// CHANGE: Compile .gitignore-style rules into minimatch matchers
// WHY: Version-control ignore patterns are one of the exclusion predicates
// FORMAT THEOREM: ignored(p) = ¬negated(r) for the last rule r matching p, false when none matches
// PURITY: CORE
// INVARIANT: Paths are root-relative with "/" separators
// COMPLEXITY: O(r) per path where r = |rules|

import { Minimatch } from "minimatch";

export interface IgnoreRule {
	readonly pattern: string;
	readonly negated: boolean;
	readonly matchers: readonly Minimatch[];
}

export interface IgnoreSpec {
	readonly source: string;
	readonly rules: readonly IgnoreRule[];
}

const MATCH_OPTIONS = { dot: true, nocomment: true, nonegate: true } as const;

/**
 * Compiles one ignore-file line; null for blanks and comments.
 *
 * - `!` negates, `\#` and `\!` escape a literal first character;
 * - a trailing `/` restricts the rule to directories (their descendants);
 * - a `/` anywhere else anchors the rule at the root, otherwise it applies
 *   at any depth.
 *
 * @pure true
 */
export function compileIgnoreRule(rawLine: string): IgnoreRule | null {
	let line = rawLine.replace(/\s+$/u, "");
	if (line.length === 0 || line.startsWith("#")) return null;
	if (line.startsWith("\\#") || line.startsWith("\\!")) line = line.slice(1);

	const negated = line.startsWith("!") && !rawLine.startsWith("\\!");
	if (negated) line = line.slice(1);

	const directoryOnly = line.endsWith("/");
	line = line.replace(/\/+$/u, "");
	const anchored = line.includes("/");
	line = line.replace(/^\/+/u, "");
	if (line.length === 0) return null;

	const base = anchored ? line : `**/${line}`;
	const globs = directoryOnly ? [`${base}/**/*`] : [base, `${base}/**/*`];
	return {
		pattern: rawLine.trim(),
		negated,
		matchers: globs.map((glob) => new Minimatch(glob, MATCH_OPTIONS)),
	};
}

/**
 * Parses the content of an ignore file.
 *
 * @pure true
 * @complexity O(n) where n = |lines|
 */
export function parseIgnoreSpec(content: string, source: string): IgnoreSpec {
	const rules = content
		.split(/\r?\n/u)
		.map(compileIgnoreRule)
		.filter((rule): rule is IgnoreRule => rule !== null);
	return { source, rules };
}

/**
 * Whether the rules ignore a root-relative path. The last matching rule wins.
 *
 * @pure true
 */
export function matchesIgnoreSpec(
	spec: IgnoreSpec,
	relativePath: string,
): boolean {
	let ignored = false;
	for (const rule of spec.rules) {
		if (rule.matchers.some((m) => m.match(relativePath))) {
			ignored = !rule.negated;
		}
	}
	return ignored;
}
