import { describe, expect, it } from "vitest";

import { formatStylish, summarize } from "../../../src/core/format/index.js";
import { fileReport, violation } from "../../utils/builders.js";

describe("formatStylish", () => {
	it("groups violations under their file and aligns positions", () => {
		const summary = summarize([
			fileReport("src/a.js", [
				violation({ line: 1, column: 10 }),
				violation({
					ruleId: "indentation",
					severity: "warning",
					message: "Expected indentation with spaces but found a tab.",
					line: 12,
					column: 1,
				}),
			]),
			fileReport("src/clean.js", []),
		]);

		expect(formatStylish(summary)).toBe(
			[
				"src/a.js",
				"  1:10  error    Missing semicolon.  semicolon",
				"  12:1  warning  Expected indentation with spaces but found a tab.  indentation",
				"",
				"✖ 2 problems (1 error, 1 warning)",
			].join("\n"),
		);
	});

	it("pads shorter positions to the widest one in the file", () => {
		const summary = summarize([
			fileReport("b.js", [
				violation({ line: 3, column: 1 }),
				violation({ line: 10, column: 12 }),
			]),
		]);

		expect(formatStylish(summary).split("\n")).toEqual([
			"b.js",
			"  3:1    error    Missing semicolon.  semicolon",
			"  10:12  error    Missing semicolon.  semicolon",
			"",
			"✖ 2 problems (2 errors, 0 warnings)",
		]);
	});

	it("uses singular nouns for a count of one", () => {
		const summary = summarize([fileReport("c.js", [violation()])]);
		expect(formatStylish(summary).split("\n").at(-1)).toBe(
			"✖ 1 problem (1 error, 0 warnings)",
		);
	});

	it("prints a success line when nothing was found", () => {
		expect(formatStylish(summarize([fileReport("a.js", [])]))).toBe(
			"✔ No style violations found.",
		);
	});
});
