// CHANGE: Console-backed output sink
// WHY: Standard output carries the suggested header; diagnostics go to stderr
// PURITY: SHELL

import type { OutputSink } from "../../core/types/index.js";

export const consoleSink: OutputSink = {
	stdout: (line) => console.log(line),
	stderr: (line) => console.error(line),
};

/**
 * Sink that records lines in memory, for programmatic callers and tests.
 */
export function createBufferedSink(): OutputSink & {
	readonly out: readonly string[];
	readonly err: readonly string[];
} {
	const out: string[] = [];
	const err: string[] = [];
	return {
		out,
		err,
		stdout: (line) => out.push(line),
		stderr: (line) => err.push(line),
	};
}
