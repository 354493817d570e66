import { describe, expect, it } from "vitest";

import {
	ConfigError,
	describeError,
	FSError,
	IgnoreSpecError,
	messageOf,
	NoConsensus,
	UnknownLanguage,
} from "../../src/core/errors.js";

describe("describeError", () => {
	it("renders consensus failures per field", () => {
		expect(describeError(new NoConsensus({ field: "copyright" }))).toBe(
			"cannot find any copyright notice in any source file",
		);
		expect(describeError(new NoConsensus({ field: "license" }))).toBe(
			"cannot find any SPDX-License-Identifier tag in any source file",
		);
	});

	it("prefixes filesystem errors with their path when known", () => {
		expect(describeError(new FSError({ detail: "EACCES", path: "/tmp/x" }))).toBe(
			"/tmp/x: EACCES",
		);
		expect(describeError(new FSError({ detail: "EACCES" }))).toBe("EACCES");
	});

	it("renders load failures", () => {
		expect(
			describeError(new IgnoreSpecError({ path: "/r/.gitignore", detail: "missing" })),
		).toBe("cannot load ignore file /r/.gitignore: missing");
		expect(
			describeError(new ConfigError({ path: "cfg.json", detail: "bad" })),
		).toBe("invalid configuration cfg.json: bad");
		expect(
			describeError(new UnknownLanguage({ language: "Go", path: "a.go" })),
		).toBe('unknown language "Go" for "a.go"');
	});
});

describe("messageOf", () => {
	it("uses the message of an Error and stringifies anything else", () => {
		expect(messageOf(new Error("boom"))).toBe("boom");
		expect(messageOf(42)).toBe("42");
	});
});
