import { describe, expect, it } from "vitest";

import {
	isSuppressed,
	parseDirectives,
	parseRuleList,
} from "../../../src/core/evaluate/index.js";
import { scanSource } from "../../../src/core/scanner/index.js";

const directivesOf = (source: string) =>
	parseDirectives(scanSource(source, "a.js").comments);

describe("parseRuleList", () => {
	it("returns all rules for an empty list", () => {
		expect(parseRuleList("")).toBe("all");
		expect(parseRuleList("   ")).toBe("all");
	});

	it("splits ids on commas and whitespace and drops the reason", () => {
		expect(parseRuleList(" semicolon, eqeqeq -- legacy code")).toEqual(
			new Set(["semicolon", "eqeqeq"]),
		);
	});
});

describe("parseDirectives", () => {
	it("maps line directives to their target lines", () => {
		const index = directivesOf(
			"foo(); // guidelint-disable-line semicolon\n// guidelint-disable-next-line\nbar()\n",
		);
		expect(index.lines).toEqual([
			{ line: 1, rules: new Set(["semicolon"]) },
			{ line: 3, rules: "all" },
		]);
		expect(index.ranges).toEqual([]);
	});

	it("keeps range directives with their position", () => {
		const index = directivesOf(
			"/* guidelint-disable */\nfoo()\n  /* guidelint-enable eqeqeq */\n",
		);
		expect(index.ranges).toEqual([
			{ kind: "disable", rules: "all", line: 1, column: 1 },
			{ kind: "enable", rules: new Set(["eqeqeq"]), line: 3, column: 3 },
		]);
	});

	it("ignores comments that only start like a directive", () => {
		expect(directivesOf("// guidelint-disabled\n// see guidelint-disable\n")).toEqual({
			ranges: [],
			lines: [],
		});
	});
});

describe("isSuppressed", () => {
	const index = directivesOf(
		[
			"/* guidelint-disable */",
			"a()",
			"/* guidelint-enable semicolon */",
			"b()",
			"/* guidelint-enable */",
			"c()",
			"",
		].join("\n"),
	);

	it("applies the last range directive naming the rule", () => {
		expect(isSuppressed(index, { ruleId: "semicolon", line: 2, column: 4 })).toBe(true);
		expect(isSuppressed(index, { ruleId: "semicolon", line: 4, column: 4 })).toBe(false);
		expect(isSuppressed(index, { ruleId: "eqeqeq", line: 4, column: 1 })).toBe(true);
		expect(isSuppressed(index, { ruleId: "eqeqeq", line: 6, column: 1 })).toBe(false);
	});
});
