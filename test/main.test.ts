import { afterEach, describe, expect, it } from "vitest";

import { main } from "../src/main.js";
import { USAGE } from "../src/shell/config/cli.js";
import { createBufferedSink } from "../src/shell/output/sink.js";
import { compliantSource, createTempTree, type TempTree } from "./utils/tempTree.js";

describe("main", () => {
	let tree: TempTree | undefined;

	afterEach(() => {
		tree?.cleanup();
		tree = undefined;
	});

	it("prints usage for --help without scanning", async () => {
		const sink = createBufferedSink();

		const exitCode = await main(["--help", "/nonexistent"], sink);

		expect(exitCode).toBe(0);
		expect(sink.out).toEqual([...USAGE]);
		expect(sink.err).toEqual([]);
	});

	it("warns about unknown options and keeps going", async () => {
		tree = createTempTree({ ".gitignore": "", "a.ts": compliantSource() });
		const sink = createBufferedSink();

		const exitCode = await main(["--fix", tree.root], sink);

		expect(exitCode).toBe(0);
		expect(sink.err).toEqual(["⚠️  Ignoring unknown option: --fix"]);
		expect(sink.out).toEqual([]);
	});

	it("reports fatal errors with exit code 1", async () => {
		tree = createTempTree({ ".gitignore": "", "a.ts": "export {};\n" });
		const sink = createBufferedSink();

		const exitCode = await main([tree.root], sink);

		expect(exitCode).toBe(1);
		expect(sink.err).toEqual([
			"Fatal error: cannot find any copyright notice in any source file",
		]);
	});
});
