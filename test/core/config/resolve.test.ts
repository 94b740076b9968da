import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	DEFAULT_EXTENSIONS,
	defaultLinterConfig,
	parseSeverity,
	resolveLinterConfig,
	resolveRuleSetting,
} from "../../../src/core/config/index.js";
import { getRule } from "../../../src/core/rules/index.js";
import type { JSONValue } from "../../../src/core/types/index.js";
import { settle } from "../../utils/builders.js";

const reasonOf = (value: JSONValue): string =>
	Either.match(resolveLinterConfig(value), {
		onLeft: (reason) => reason,
		onRight: () => "resolved",
	});

describe("parseSeverity", () => {
	it.each([
		["off", "off"],
		["warning", "warning"],
		["warn", "warning"],
		["error", "error"],
		[0, "off"],
		[1, "warning"],
		[2, "error"],
	] as const)("maps %j to %s", (raw, expected) => {
		expect(settle(parseSeverity(raw))).toEqual({ right: expected });
	});

	it("rejects anything else", () => {
		expect(settle(parseSeverity("fatal"))).toEqual({
			left: 'invalid severity "fatal" (expected "off", "warning" or "error")',
		});
		expect(Either.isLeft(parseSeverity(3))).toBe(true);
	});
});

describe("resolveRuleSetting", () => {
	const semicolon = getRule("semicolon");

	it("uses defaults for a missing entry", () => {
		expect(settle(resolveRuleSetting(semicolon, undefined))).toEqual(
			{ right: { severity: "error", options: { mode: "always" } } },
		);
	});

	it("accepts a bare severity and the array forms", () => {
		expect(settle(resolveRuleSetting(semicolon, "warn"))).toEqual(
			{ right: { severity: "warning", options: { mode: "always" } } },
		);
		expect(settle(resolveRuleSetting(semicolon, ["off"]))).toEqual(
			{ right: { severity: "off", options: { mode: "always" } } },
		);
		expect(settle(resolveRuleSetting(semicolon, ["error", { mode: "never" }]))).toEqual(
			{ right: { severity: "error", options: { mode: "never" } } },
		);
	});

	it("prefixes failures with the rule id", () => {
		expect(settle(resolveRuleSetting(semicolon, []))).toEqual(
			{ left: 'rule "semicolon": expected [severity] or [severity, options]' },
		);
		expect(settle(resolveRuleSetting(semicolon, ["error", "never"]))).toEqual(
			{ left: 'rule "semicolon": options must be an object' },
		);
		expect(settle(resolveRuleSetting(semicolon, ["error", { mood: "never" }]))).toEqual(
			{ left: 'rule "semicolon": unknown key "mood"' },
		);
	});
});

describe("resolveLinterConfig", () => {
	it("resolves an empty document to the defaults", () => {
		expect(settle(resolveLinterConfig({}))).toEqual({ right: defaultLinterConfig() });
	});

	it("merges rule options over the defaults", () => {
		const config = Either.getOrThrow(
			resolveLinterConfig({
				extensions: [".JS", ".es6"],
				ignore: ["vendor"],
				rules: { "quote-style": ["warning", { style: "double" }] },
			}),
		);

		expect(config.extensions).toEqual([".js", ".es6"]);
		expect(config.ignore).toEqual(["vendor"]);
		expect(config.rules["quote-style"]).toEqual({
			severity: "warning",
			options: { style: "double", avoidEscape: true },
		});
		expect(config.rules.semicolon).toEqual(defaultLinterConfig().rules.semicolon);
	});

	const invalid: ReadonlyArray<readonly [JSONValue, string]> = [
		[[], "configuration must be a JSON object"],
		[{ plugins: [] }, 'unknown key "plugins"'],
		[{ rules: [] }, '"rules" must be an object'],
		[{ rules: { "no-var": "error" } }, 'unknown rule "no-var"'],
		[{ rules: { toString: "error" } }, 'unknown rule "toString"'],
		[{ rules: { constructor: "off" } }, 'unknown rule "constructor"'],
		[{ extensions: ["js"] }, '"extensions" entries must look like ".js"'],
		[{ ignore: "vendor" }, '"ignore" must be an array of strings, got string'],
		[
			{ rules: { "quote-style": ["error", { style: "backtick" }] } },
			'rule "quote-style": "style" must be one of "single", "double"',
		],
	];

	it.each(invalid)("rejects %j", (value, reason) => {
		expect(reasonOf(value)).toBe(reason);
	});

	it("keeps the default extensions when none are given", () => {
		const extensions = Either.map(
			resolveLinterConfig({ ignore: [] }),
			(config) => config.extensions,
		);
		expect(settle(extensions)).toEqual({ right: DEFAULT_EXTENSIONS });
	});
});
