import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	createHeuristicClassifier,
	DEFAULT_COMMENT_PREFIXES,
	extensionOf,
	resolveCommentPrefix,
	shebangInterpreter,
} from "../../../src/core/language/classify.js";
import type { LanguageTable } from "../../../src/core/types/index.js";

const table: LanguageTable = {
	extensions: { ".ts": "TypeScript", ".go": "Go", ".js": "JavaScript" },
	filenames: { Makefile: "Makefile" },
	interpreters: { node: "JavaScript", deno: "TypeScript", python3: "Python" },
};

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("extensionOf", () => {
	it("returns the lowercased last extension", () => {
		expect(extensionOf("src/Main.TS")).toBe(".ts");
		expect(extensionOf("a/b.test.go")).toBe(".go");
	});

	it("treats a leading dot and a missing dot as no extension", () => {
		expect(extensionOf(".eslintrc")).toBe("");
		expect(extensionOf("bin/tool")).toBe("");
	});
});

describe("shebangInterpreter", () => {
	it("reads the program of a direct shebang", () => {
		expect(shebangInterpreter(bytes("#!/usr/bin/python3\nprint()\n"))).toBe(
			"python3",
		);
	});

	it("skips env and its flags", () => {
		expect(shebangInterpreter(bytes("#!/usr/bin/env node\n"))).toBe("node");
		expect(
			shebangInterpreter(bytes("#!/usr/bin/env -S deno run --allow-read\n")),
		).toBe("deno");
	});

	it("is empty without a shebang", () => {
		expect(shebangInterpreter(bytes("// Copyright\n"))).toBe("");
		expect(shebangInterpreter(new Uint8Array())).toBe("");
	});
});

describe("createHeuristicClassifier", () => {
	const classifier = createHeuristicClassifier(table);

	it("classifies by extension", () => {
		expect(classifier.classify("pkg/main.go", bytes("package main\n"))).toBe("Go");
	});

	it("prefers the shebang interpreter over the extension", () => {
		expect(
			classifier.classify("tool.js", bytes("#!/usr/bin/env -S deno run\n")),
		).toBe("TypeScript");
	});

	it("falls back to the extension for an unknown interpreter", () => {
		expect(classifier.classify("x.ts", bytes("#!/usr/bin/env zx\n"))).toBe(
			"TypeScript",
		);
	});

	it("classifies exact file names", () => {
		expect(classifier.classify("build/Makefile", bytes("all:\n"))).toBe(
			"Makefile",
		);
	});

	it("returns an empty id when nothing matches", () => {
		expect(classifier.classify("notes.txt", bytes("hello\n"))).toBe("");
	});
});

describe("resolveCommentPrefix", () => {
	it("maps a configured language to its prefix", () => {
		expect(
			Either.getOrNull(
				resolveCommentPrefix("TypeScript", "a.ts", DEFAULT_COMMENT_PREFIXES),
			),
		).toBe("//");
	});

	it("fails with UnknownLanguage for unconfigured or empty languages", () => {
		for (const language of ["Go", ""]) {
			const result = resolveCommentPrefix(language, "a.go", DEFAULT_COMMENT_PREFIXES);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left._tag).toBe("UnknownLanguage");
				expect(result.left.language).toBe(language);
				expect(result.left.path).toBe("a.go");
			}
		}
	});
});
