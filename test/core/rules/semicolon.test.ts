import { describe, expect, it } from "vitest";

import { describeFindings, runCheck } from "../../utils/builders.js";

const SOURCE = "const a = 1\nlet b = 2;\nfoo()\n";

describe("semicolon", () => {
	it("reports missing semicolons after the last token", () => {
		expect(runCheck("semicolon", SOURCE)).toEqual([
			{ line: 1, column: 12, message: "Missing semicolon." },
			{ line: 3, column: 6, message: "Missing semicolon." },
		]);
	});

	it("reports semicolons in never mode", () => {
		expect(runCheck("semicolon", SOURCE, { mode: "never" })).toEqual([
			{
				line: 2,
				column: 10,
				endLine: 2,
				endColumn: 11,
				message: "Extra semicolon.",
			},
		]);
	});

	it("checks class property declarations", () => {
		const source = "class A {\n  x = 1\n}\n";
		expect(describeFindings(runCheck("semicolon", source))).toEqual([
			"2:8 Missing semicolon.",
		]);
	});

	it("does not require semicolons after block statements", () => {
		const source = "if (a) {\n  b();\n}\nfunction f() {}\n";
		expect(runCheck("semicolon", source)).toEqual([]);
	});
});
