import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { crawlFiles } from "../../../src/shell/fs/crawler.js";
import { createTempTree, type TempTree } from "../../utils/tempTree.js";

describe("crawlFiles", () => {
	let tree: TempTree | undefined;

	afterEach(() => {
		tree?.cleanup();
		tree = undefined;
	});

	it("lists files depth-first in code-unit order and skips .git", async () => {
		tree = createTempTree({
			"b.ts": "",
			"a/z.ts": "",
			"a/B.ts": "",
			".git/config": "",
			".git/objects/00/x": "",
			"pkg/.git/HEAD": "",
			".gitignore": "",
		});

		const candidates = await Effect.runPromise(crawlFiles(tree.root));

		expect(candidates.map((c) => c.relativePath)).toEqual([
			".gitignore",
			"a/B.ts",
			"a/z.ts",
			"b.ts",
		]);
	});

	it("joins the root as given into the display path", async () => {
		tree = createTempTree({ "src/a.ts": "" });

		const [candidate] = await Effect.runPromise(crawlFiles(tree.root));

		expect(candidate?.displayPath).toBe(path.join(tree.root, "src/a.ts"));
		expect(candidate?.absolutePath).toBe(path.join(tree.root, "src", "a.ts"));
	});

	it("follows symlinks to files only", async () => {
		tree = createTempTree({ "real/a.ts": "" });
		fs.symlinkSync(path.join(tree.root, "real", "a.ts"), path.join(tree.root, "link.ts"));
		fs.symlinkSync(path.join(tree.root, "real"), path.join(tree.root, "dirlink"));
		fs.symlinkSync(path.join(tree.root, "nowhere.ts"), path.join(tree.root, "dangling.ts"));

		const candidates = await Effect.runPromise(crawlFiles(tree.root));

		expect(candidates.map((c) => c.relativePath)).toEqual(["link.ts", "real/a.ts"]);
	});

	it("fails for a missing root", async () => {
		tree = createTempTree({});
		const result = await Effect.runPromise(
			Effect.either(crawlFiles(path.join(tree.root, "absent"))),
		);
		expect(result._tag).toBe("Left");
	});
});
