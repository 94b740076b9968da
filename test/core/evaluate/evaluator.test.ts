import { describe, expect, it } from "vitest";

import { defaultLinterConfig } from "../../../src/core/config/index.js";
import {
	evaluateModel,
	lintText,
	runRule,
	toViolation,
} from "../../../src/core/evaluate/index.js";
import { BUILTIN_RULES } from "../../../src/core/rules/index.js";
import { scanSource } from "../../../src/core/scanner/index.js";
import { configWith, onlyRules } from "../../utils/builders.js";

describe("lintText", () => {
	it("reports every enabled rule in position order", () => {
		const report = lintText("var a = 1\n", "a.js", defaultLinterConfig());

		expect(report).toEqual({
			filePath: "a.js",
			errorCount: 2,
			warningCount: 0,
			violations: [
				{
					ruleId: "no-implicit-globals",
					severity: "error",
					message: "'a' is declared in the global scope.",
					line: 1,
					column: 5,
					endLine: 1,
					endColumn: 6,
				},
				{
					ruleId: "semicolon",
					severity: "error",
					message: "Missing semicolon.",
					line: 1,
					column: 10,
				},
			],
		});
	});

	it("uses the configured severity", () => {
		const report = lintText(
			"var a = 1\n",
			"a.js",
			configWith({ semicolon: "warning", "no-implicit-globals": "off" }),
		);

		expect(report.errorCount).toBe(0);
		expect(report.warningCount).toBe(1);
		expect(report.violations.map((v) => `${v.ruleId}:${v.severity}`)).toEqual([
			"semicolon:warning",
		]);
	});

	it("replaces rule results with parse errors", () => {
		const report = lintText(
			"// guidelint-disable\nlet = ;\n",
			"broken.js",
			defaultLinterConfig(),
		);

		expect(report.violations.length).toBeGreaterThan(0);
		for (const violation of report.violations) {
			expect(violation.ruleId).toBe("parse-error");
			expect(violation.severity).toBe("error");
			expect(violation.message).toMatch(/^Parsing error: /u);
			expect(violation.line).toBe(2);
		}
		expect(report.errorCount).toBe(report.violations.length);
	});

	it("honours inline directives", () => {
		const report = lintText(
			"foo() // guidelint-disable-line semicolon\nbar()\n",
			"a.js",
			onlyRules("semicolon"),
		);

		expect(report.violations.map((v) => `${v.line}:${v.column}`)).toEqual([
			"2:6",
		]);
	});

	it("ignores directive-like JSX text", () => {
		const report = lintText(
			"const a = <p>// guidelint-disable semicolon</p>;\nfoo()\n",
			"a.jsx",
			onlyRules("semicolon"),
		);

		expect(report.violations.map((v) => `${v.line}:${v.column}`)).toEqual([
			"2:6",
		]);
	});

	it("lets a rule-specific enable end a blanket disable", () => {
		const source = [
			"/* guidelint-disable */",
			"x == y",
			"/* guidelint-enable eqeqeq */",
			"x == y",
			"",
		].join("\n");
		const report = lintText(source, "a.js", onlyRules("eqeqeq", "semicolon"));

		expect(
			report.violations.map((v) => `${v.line}:${v.column} ${v.ruleId}`),
		).toEqual(["4:3 eqeqeq"]);
	});
});

describe("runRule", () => {
	const model = scanSource("foo()\n", "a.js");

	it("returns nothing for a rule that is off", () => {
		const { rules } = configWith({ semicolon: "off" });
		expect(runRule("semicolon", model, rules, BUILTIN_RULES)).toEqual([]);
	});

	it("falls back to the rule's default message", () => {
		const violation = toViolation("eqeqeq", "warning", "Default.", {
			line: 3,
			column: 4,
		});
		expect(violation).toEqual({
			ruleId: "eqeqeq",
			severity: "warning",
			message: "Default.",
			line: 3,
			column: 4,
		});
	});
});

describe("evaluateModel", () => {
	it("runs rules from a custom registry", () => {
		const registry = {
			...BUILTIN_RULES,
			eqeqeq: {
				...BUILTIN_RULES.eqeqeq,
				check: () => [{ line: 1, column: 1 }],
			},
		};
		const violations = evaluateModel(
			scanSource("foo();\n", "a.js"),
			onlyRules("eqeqeq").rules,
			registry,
		);

		expect(violations).toEqual([
			{
				ruleId: "eqeqeq",
				severity: "error",
				message: "Expected a strict equality operator.",
				line: 1,
				column: 1,
			},
		]);
	});
});
