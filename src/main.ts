// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/runCensus
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCensusCli } from "./app/runCensus.js";
import type { ExitCode } from "./core/models.js";
import type { OutputSink } from "./core/types/index.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";
import { consoleSink } from "./shell/output/sink.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args - Command-line arguments without node and script path
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
	sink: OutputSink = consoleSink,
): Promise<ExitCode> {
	const cliOptions = parseCLIArgs(args);
	for (const flag of cliOptions.unknownFlags) {
		sink.stderr(`⚠️  Ignoring unknown option: ${flag}`);
	}
	if (cliOptions.help) {
		for (const line of USAGE) sink.stdout(line);
		return 0;
	}
	return Effect.runPromise(runCensusCli(cliOptions, sink));
}
