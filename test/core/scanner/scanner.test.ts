import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	firstTokenIndexAtOrAfter,
	locationOf,
	scanSource,
	tokenBefore,
} from "../../../src/core/scanner/index.js";

describe("scanSource: tokens", () => {
	it("exposes tokens with text, kind and 1-based positions", () => {
		const model = scanSource("var a = 1\n", "a.js");
		expect(model.tokens.map((token) => token.text)).toEqual(["var", "a", "=", "1"]);
		expect(model.tokens.map((token) => token.kind)).toEqual([
			"keyword",
			"identifier",
			"punctuator",
			"number",
		]);
		expect(model.tokens[1]).toMatchObject({
			line: 1,
			column: 5,
			endLine: 1,
			endColumn: 6,
			start: 4,
			end: 5,
		});
	});

	it("classifies template and regex literals", () => {
		const model = scanSource("const s = `a${b}c`;\nconst r = /ab+c/g;\n", "a.js");
		expect(
			model.tokens
				.filter((token) => token.kind === "template" || token.kind === "regex")
				.map((token) => [token.kind, token.text]),
		).toEqual([
			["template", "`a${"],
			["template", "}c`"],
			["regex", "/ab+c/g"],
		]);
	});
});

describe("scanSource: comments, lines and statements", () => {
	it("collects line and block comments in order", () => {
		const model = scanSource("// one\nlet x = 1; /* two */\n", "a.js");
		expect(
			model.comments.map((comment) => [comment.kind, comment.value, comment.line]),
		).toEqual([
			["line", " one", 1],
			["block", " two ", 2],
		]);
	});

	it("does not read JSX text as a comment", () => {
		const model = scanSource(
			"const a = <p>// x</p>;\nconst b = <p>{/* kept */}</p>;\n",
			"a.jsx",
		);
		expect(model.comments.map((comment) => comment.text)).toEqual([
			"/* kept */",
		]);
	});

	it("splits lines on every line terminator", () => {
		expect(scanSource("a\r\nb\n", "a.js").lines).toEqual(["a", "b", ""]);
	});

	it("records statement boundaries with their terminator", () => {
		const model = scanSource("foo()\nbar();\n", "a.js");
		expect(
			model.statements.map((statement) => [
				statement.lastToken.text,
				statement.terminated,
			]),
		).toEqual([
			[")", false],
			[";", true],
		]);
	});
});

describe("scanSource: parse results", () => {
	it("reports syntax errors with positions", () => {
		const model = scanSource("let = ;\n", "a.js");
		expect(model.syntaxErrors.length).toBeGreaterThan(0);
		expect(model.syntaxErrors[0]?.line).toBe(1);
	});

	it("parses JSX in .jsx files", () => {
		const model = scanSource('const el = <div className="box" />;\n', "view.jsx");
		expect(model.syntaxErrors).toEqual([]);
	});

	it("detects module syntax", () => {
		expect(scanSource("import x from 'y';\n", "a.js").isModuleSyntax).toBe(true);
		expect(scanSource("var a;\n", "a.js").isModuleSyntax).toBe(false);
	});
});

describe("navigation", () => {
	it("finds tokens by offset", () => {
		const model = scanSource("if (a) {}\n", "a.js");
		const index = firstTokenIndexAtOrAfter(model, 5);
		expect(model.tokens[index]?.text).toBe(")");
		expect(tokenBefore(model, 5)?.text).toBe("a");
		expect(locationOf(model, 8)).toEqual({ line: 1, column: 9 });
	});
});

describe("scanSource: invariants", () => {
	const statement = fc.constantFrom(
		"let a = 1;",
		"foo(bar);",
		"// note",
		"if (x) { y(); }",
		"const s = 'str';",
		"const t = `t${v}`;",
		"/* block */",
		"",
	);

	it("tokens match the text and never overlap", () => {
		fc.assert(
			fc.property(fc.array(statement, { maxLength: 12 }), (parts) => {
				const text = parts.join("\n");
				const model = scanSource(text, "a.js");
				model.tokens.forEach((token, index) => {
					expect(text.slice(token.start, token.end)).toBe(token.text);
					const next = model.tokens[index + 1];
					if (next !== undefined) {
						expect(token.end).toBeLessThanOrEqual(next.start);
					}
				});
				const expectedComments = parts.filter(
					(part) => part === "// note" || part === "/* block */",
				).length;
				expect(model.comments.length).toBe(expectedComments);
			}),
		);
	});
});
