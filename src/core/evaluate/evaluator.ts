// CHANGE: Rule evaluator: fan-out of enabled rules over one SyntacticModel
// FORMAT THEOREM: ∀ model m without syntax errors:
//   evaluateModel(m) = sort({ toViolation(f) | id ∈ RULE_IDS, severity(id) ≠ off, f ∈ check_id(m) } \ suppressed)
// PURITY: CORE
// INVARIANT: Parse errors replace every rule result and are never suppressed
// COMPLEXITY: O(Σ cost(check_id)) + O(v log v) for sorting

import { buildFileReport, sortViolations } from "../format/summary.js";
import { BUILTIN_RULES, RULE_IDS } from "../rules/index.js";
import { scanSource } from "../scanner/index.js";
import {
	type FileReport,
	type LinterConfig,
	PARSE_ERROR_RULE_ID,
	type ResolvedRuleSettings,
	type RuleFinding,
	type RuleId,
	type RuleRegistry,
	type Severity,
	type SyntacticModel,
	type Violation,
} from "../types/index.js";
import { isSuppressed, parseDirectives } from "./directives.js";

export function toViolation(
	ruleId: RuleId,
	severity: Severity,
	defaultMessage: string,
	finding: RuleFinding,
): Violation {
	return {
		ruleId,
		severity,
		message: finding.message ?? defaultMessage,
		line: finding.line,
		column: finding.column,
		...(finding.endLine === undefined ? {} : { endLine: finding.endLine }),
		...(finding.endColumn === undefined ? {} : { endColumn: finding.endColumn }),
	};
}

/**
 * Runs one rule with its configured setting.
 *
 * @invariant settings[id].severity = "off" → []
 */
export function runRule<K extends RuleId>(
	id: K,
	model: SyntacticModel,
	settings: ResolvedRuleSettings,
	registry: RuleRegistry,
): ReadonlyArray<Violation> {
	const setting = settings[id];
	const severity = setting.severity;
	if (severity === "off") return [];
	const rule = registry[id];
	return rule
		.check(model, setting.options)
		.map((finding) => toViolation(id, severity, rule.message, finding));
}

function parseErrorViolations(model: SyntacticModel): Violation[] {
	return model.syntaxErrors.map(
		(error): Violation => ({
			ruleId: PARSE_ERROR_RULE_ID,
			severity: "error",
			message: `Parsing error: ${error.message}`,
			line: error.line,
			column: error.column,
		}),
	);
}

/**
 * Evaluates every enabled rule against a scanned file.
 *
 * @param model - Scanned file
 * @param settings - Severity and options per rule
 * @returns Violations sorted by line, column and rule id
 *
 * @pure true
 * @invariant model.syntaxErrors ≠ ∅ → ∀v ∈ result: v.ruleId = "parse-error"
 */
export function evaluateModel(
	model: SyntacticModel,
	settings: ResolvedRuleSettings,
	registry: RuleRegistry = BUILTIN_RULES,
): ReadonlyArray<Violation> {
	if (model.syntaxErrors.length > 0) {
		return sortViolations(parseErrorViolations(model));
	}
	const directives = parseDirectives(model.comments);
	const violations = RULE_IDS.flatMap((id) =>
		runRule(id, model, settings, registry),
	).filter((violation) => !isSuppressed(directives, violation));
	return sortViolations(violations);
}

/**
 * Scans and evaluates one source text.
 *
 * @example
 * ```ts
 * const report = lintText("var a = 1\n", "a.js", defaultLinterConfig());
 * report.violations.map((v) => v.ruleId); // ["no-implicit-globals", "semicolon"]
 * ```
 */
export function lintText(
	text: string,
	filePath: string,
	config: Pick<LinterConfig, "rules">,
	registry: RuleRegistry = BUILTIN_RULES,
): FileReport {
	const model = scanSource(text, filePath);
	return buildFileReport(
		filePath,
		evaluateModel(model, config.rules, registry),
	);
}
