import { describe, expect, it } from "vitest";

import {
	compileIgnoreRule,
	matchesIgnoreSpec,
	parseIgnoreSpec,
} from "../../../src/core/filter/ignore-rules.js";

const spec = (content: string) => parseIgnoreSpec(content, ".gitignore");

describe("compileIgnoreRule", () => {
	it("skips blank lines and comments", () => {
		expect(compileIgnoreRule("")).toBeNull();
		expect(compileIgnoreRule("   ")).toBeNull();
		expect(compileIgnoreRule("# comment")).toBeNull();
	});

	it("marks negated rules", () => {
		expect(compileIgnoreRule("!keep.ts")?.negated).toBe(true);
		expect(compileIgnoreRule("\\!literal.ts")?.negated).toBe(false);
	});
});

describe("matchesIgnoreSpec", () => {
	it("matches unanchored patterns at any depth", () => {
		const s = spec("*.gen.ts\n");
		expect(matchesIgnoreSpec(s, "a.gen.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "src/deep/b.gen.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "src/b.ts")).toBe(false);
	});

	it("anchors patterns containing a slash at the root", () => {
		const s = spec("/build\nsrc/generated\n");
		expect(matchesIgnoreSpec(s, "build/out.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "pkg/build/out.ts")).toBe(false);
		expect(matchesIgnoreSpec(s, "src/generated/a.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "lib/src/generated/a.ts")).toBe(false);
	});

	it("applies directory-only patterns to descendants, not to files of that name", () => {
		const s = spec("out/\n");
		expect(matchesIgnoreSpec(s, "out/a.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "pkg/out/a.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "out")).toBe(false);
	});

	it("lets the last matching rule win", () => {
		const s = spec("*.ts\n!keep.ts\n");
		expect(matchesIgnoreSpec(s, "drop.ts")).toBe(true);
		expect(matchesIgnoreSpec(s, "src/keep.ts")).toBe(false);
	});

	it("matches dot files", () => {
		expect(matchesIgnoreSpec(spec(".env*\n"), "config/.env.local")).toBe(true);
	});

	it("ignores nothing for an empty ignore file", () => {
		expect(matchesIgnoreSpec(spec(""), "src/a.ts")).toBe(false);
	});
});
