import { describe, expect, it } from "vitest";

import {
	buildCensusReport,
	describeViolation,
	evaluateFile,
	formatModifiedMarker,
	formatViolation,
	suggestedHeader,
} from "../../../src/core/report/violations.js";
import type { Consensus, SourceFile } from "../../../src/core/types/index.js";

const consensus: Consensus = {
	copyright: "Copyright 2024 Example Corp",
	license: "SPDX-License-Identifier: BSD-2-Clause",
};

const file = (
	path: string,
	copyright: string,
	license: string,
	commentPrefix = "//",
): SourceFile => ({ path, relativePath: path, commentPrefix, copyright, license });

describe("evaluateFile", () => {
	it("accepts a file matching the consensus", () => {
		expect(
			evaluateFile(file("a.ts", consensus.copyright, consensus.license), consensus),
		).toEqual([]);
	});

	it("reports missing fields copyright first", () => {
		expect(evaluateFile(file("a.ts", "", ""), consensus)).toEqual([
			{ kind: "missing-copyright" },
			{ kind: "missing-license" },
		]);
	});

	it("reports minority values with want and got", () => {
		expect(
			evaluateFile(
				file("a.ts", "Copyright 2020 Other", "SPDX-License-Identifier: MIT"),
				consensus,
			),
		).toEqual([
			{
				kind: "minority-copyright",
				want: consensus.copyright,
				got: "Copyright 2020 Other",
			},
			{
				kind: "minority-license",
				want: consensus.license,
				got: "SPDX-License-Identifier: MIT",
			},
		]);
	});
});

describe("buildCensusReport", () => {
	it("keeps scan order and tallies prefixes of violating files only", () => {
		const report = buildCensusReport(
			[
				file("a.ts", consensus.copyright, consensus.license),
				file("b.py", "", consensus.license, "#"),
				file("c.ts", "", "", "//"),
				file("d.py", consensus.copyright, "", "#"),
			],
			consensus,
		);

		expect(report.entries.map((e) => e.file.path)).toEqual([
			"a.ts",
			"b.py",
			"c.ts",
			"d.py",
		]);
		expect(report.violationCount).toBe(4);
		expect(report.prefixTally.get("#")).toBe(2);
		expect(report.prefixTally.get("//")).toBe(1);
	});
});

describe("formatting", () => {
	it("quotes the path and values", () => {
		expect(formatViolation("src/a.ts", { kind: "missing-copyright" })).toBe(
			'file "src/a.ts" is missing the copyright notice',
		);
		expect(
			formatViolation("src/a.ts", {
				kind: "minority-license",
				want: "SPDX-License-Identifier: MIT",
				got: "SPDX-License-Identifier: ISC",
			}),
		).toBe(
			'file "src/a.ts" has minority license identifier: want: "SPDX-License-Identifier: MIT", got: "SPDX-License-Identifier: ISC"',
		);
	});

	it("describes every violation kind", () => {
		expect(describeViolation({ kind: "missing-license" })).toBe(
			"is missing the license identifier",
		);
		expect(
			describeViolation({ kind: "minority-copyright", want: "A", got: "B" }),
		).toBe('has minority copyright notice: want: "A", got: "B"');
	});

	it("prints the modified marker without indentation", () => {
		expect(formatModifiedMarker("src/a.ts")).toBe("M src/a.ts");
	});
});

describe("suggestedHeader", () => {
	it("uses the most common prefix among violating files", () => {
		const report = buildCensusReport(
			[
				file("a.py", "", "", "#"),
				file("b.py", "", "", "#"),
				file("c.ts", "", "", "//"),
			],
			consensus,
		);
		expect(suggestedHeader(report, consensus)).toEqual([
			"# Copyright 2024 Example Corp",
			"# SPDX-License-Identifier: BSD-2-Clause",
		]);
	});

	it("is empty when nothing violates", () => {
		const report = buildCensusReport(
			[file("a.ts", consensus.copyright, consensus.license)],
			consensus,
		);
		expect(suggestedHeader(report, consensus)).toEqual([]);
	});
});
