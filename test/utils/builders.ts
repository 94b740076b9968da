// CHANGE: Shared builders for rule, evaluator and reporter tests
// INVARIANT: Builders are pure and never touch the filesystem

import { Either } from "effect";

import { resolveLinterConfig } from "../../src/core/config/index.js";
import { buildFileReport } from "../../src/core/format/index.js";
import { getRule, RULE_IDS } from "../../src/core/rules/index.js";
import { scanSource } from "../../src/core/scanner/index.js";
import type {
	FileReport,
	JSONObject,
	JSONValue,
	LinterConfig,
	RuleFinding,
	RuleId,
	RuleOptionsMap,
	Violation,
} from "../../src/core/types/index.js";

/** Runs a single rule's check with option overrides. */
export function runCheck<K extends RuleId>(
	id: K,
	source: string,
	options: Partial<RuleOptionsMap[K]> = {},
	filePath = "input.js",
): ReadonlyArray<RuleFinding> {
	const rule = getRule(id);
	return rule.check(scanSource(source, filePath), {
		...rule.defaultOptions,
		...options,
	});
}

/**
 * Findings as "line:column message", ordered by position.
 */
export function describeFindings(
	findings: ReadonlyArray<RuleFinding>,
): string[] {
	return [...findings]
		.sort((a, b) => a.line - b.line || a.column - b.column)
		.map((finding) => `${finding.line}:${finding.column} ${finding.message ?? ""}`);
}

/** Resolves a "rules" object the way guidelint.config.json would. */
export function configWith(rules: JSONObject = {}): LinterConfig {
	return Either.getOrThrowWith(
		resolveLinterConfig({ rules }),
		(reason) => new Error(reason),
	);
}

/** Configuration with every rule off except the given ones (at "error"). */
export function onlyRules(...enabled: ReadonlyArray<RuleId>): LinterConfig {
	const rules: Record<string, JSONValue> = {};
	for (const id of RULE_IDS) {
		rules[id] = enabled.includes(id) ? "error" : "off";
	}
	return configWith(rules);
}

/** Build a violation with sensible defaults. */
export const violation = (over: Partial<Violation> = {}): Violation => ({
	ruleId: "semicolon",
	severity: "error",
	message: "Missing semicolon.",
	line: 1,
	column: 1,
	...over,
});

export const fileReport = (
	filePath: string,
	violations: ReadonlyArray<Violation>,
): FileReport => buildFileReport(filePath, violations);

/** Either as a plain object, for structural assertions. */
export const settle = <R, L>(
	either: Either.Either<R, L>,
): { readonly right: R } | { readonly left: L } =>
	Either.match(either, {
		onLeft: (left) => ({ left }),
		onRight: (right) => ({ right }),
	});
