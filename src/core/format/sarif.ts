// CHANGE: SARIF 2.1.0 report for code-scanning integrations
// SOURCE: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
// PURITY: CORE
// INVARIANT: One run; driver rules list every registered rule plus parse-error
// COMPLEXITY: O(v + r) where v = |violations|, r = |rules|

import { BUILTIN_RULES, listRules } from "../rules/index.js";
import {
	type LintSummary,
	PARSE_ERROR_RULE_ID,
	type RuleRegistry,
	type SarifLocation,
	type SarifReport,
	type SarifResult,
	type SarifRuleDescriptor,
	type Violation,
} from "../types/index.js";

export const SARIF_SCHEMA = "https://json.schemastore.org/sarif-2.1.0.json";

export const TOOL_NAME = "guidelint";

function toUri(filePath: string): string {
	return filePath.replace(/\\/gu, "/");
}

function locationOf(filePath: string, violation: Violation): SarifLocation {
	return {
		physicalLocation: {
			artifactLocation: { uri: toUri(filePath) },
			region: {
				startLine: violation.line,
				startColumn: violation.column,
				...(violation.endLine === undefined
					? {}
					: { endLine: violation.endLine }),
				...(violation.endColumn === undefined
					? {}
					: { endColumn: violation.endColumn }),
			},
		},
	};
}

export function sarifRuleDescriptors(
	registry: RuleRegistry,
): ReadonlyArray<SarifRuleDescriptor> {
	return [
		...listRules(registry).map((rule) => ({
			id: rule.id,
			shortDescription: { text: rule.description },
			defaultConfiguration: { level: rule.defaultSeverity },
		})),
		{
			id: PARSE_ERROR_RULE_ID,
			shortDescription: { text: "The file could not be parsed" },
			defaultConfiguration: { level: "error" },
		},
	];
}

/**
 * Builds the SARIF document for a summary.
 *
 * @pure true
 */
export function toSarif(
	summary: LintSummary,
	registry: RuleRegistry = BUILTIN_RULES,
): SarifReport {
	const results: SarifResult[] = summary.files.flatMap((report) =>
		report.violations.map((violation) => ({
			ruleId: violation.ruleId,
			level: violation.severity,
			message: { text: violation.message },
			locations: [locationOf(report.filePath, violation)],
		})),
	);
	return {
		$schema: SARIF_SCHEMA,
		version: "2.1.0",
		runs: [
			{
				tool: {
					driver: { name: TOOL_NAME, rules: sarifRuleDescriptors(registry) },
				},
				results,
			},
		],
	};
}

export function formatSarif(
	summary: LintSummary,
	registry: RuleRegistry = BUILTIN_RULES,
): string {
	return JSON.stringify(toSarif(summary, registry), null, 2);
}
