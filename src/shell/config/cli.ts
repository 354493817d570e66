// CHANGE: CLI argument parsing for the census command
// WHY: Flags map onto CLIOptions through a lookup table instead of branching
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: The last positional argument wins; unknown options are collected, never fatal
// COMPLEXITY: O(n) where n = |args|

import type { CLIOptions } from "../../core/types/index.js";

type FlagState = Omit<CLIOptions, "unknownFlags">;

type BooleanFlag = "update" | "verbose" | "check" | "help";

const booleanFlags: Readonly<Record<string, BooleanFlag>> = {
	"-w": "update",
	"--write": "update",
	"-v": "verbose",
	"--verbose": "verbose",
	"--check": "check",
	"-h": "help",
	"--help": "help",
};

export const USAGE = [
	"Usage: header-census [options] [dir]",
	"",
	"Finds the majority copyright notice and SPDX-License-Identifier in the",
	"leading comment lines of the source files under dir (default: .) and",
	"reports the files that omit or deviate from it.",
	"",
	"Options:",
	"  -w, --write    Update files in place",
	"  -v, --verbose  Verbose",
	"  --check        Exit with status 1 when violations are found",
	"  -h, --help     Show this help",
] as const;

/**
 * Parses command-line arguments.
 *
 * @param args - Arguments without the node binary and script path
 * @returns Parsed options; `-wv` style bundles are expanded
 *
 * @example
 * ```ts
 * parseCLIArgs(["-v", "src"]);
 * // => { targetPath: "src", update: false, verbose: true, check: false, help: false, unknownFlags: [] }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: FlagState = {
		targetPath: ".",
		update: false,
		verbose: false,
		check: false,
		help: false,
	};
	const unknownFlags: string[] = [];

	for (const arg of expandShortBundles(args)) {
		if (arg.length === 0) continue;

		const flag = booleanFlags[arg];
		if (flag !== undefined) {
			state = { ...state, [flag]: true };
			continue;
		}
		if (arg.startsWith("-") && arg !== "-") {
			unknownFlags.push(arg);
			continue;
		}
		state = { ...state, targetPath: arg };
	}

	return { ...state, unknownFlags };
}

/**
 * `-wv` → `-w`, `-v`. Long options and lone dashes pass through.
 *
 * @pure true
 */
function expandShortBundles(args: readonly string[]): readonly string[] {
	return args.flatMap((arg) =>
		/^-[a-zA-Z]{2,}$/u.test(arg)
			? [...arg.slice(1)].map((letter) => `-${letter}`)
			: [arg],
	);
}
