// CHANGE: Reporter entry point dispatching on the requested format
// PURITY: CORE

import { match } from "ts-pattern";

import { BUILTIN_RULES } from "../rules/index.js";
import type {
	LintSummary,
	ReportFormat,
	RuleRegistry,
} from "../types/index.js";
import { formatJson } from "./json.js";
import { formatSarif } from "./sarif.js";
import { formatStylish } from "./stylish.js";

export { formatJson } from "./json.js";
export { formatRuleList } from "./rules-list.js";
export {
	formatSarif,
	SARIF_SCHEMA,
	sarifRuleDescriptors,
	TOOL_NAME,
	toSarif,
} from "./sarif.js";
export { formatStylish } from "./stylish.js";
export {
	buildFileReport,
	dropWarnings,
	sortViolations,
	summarize,
} from "./summary.js";

/**
 * Renders a summary in the requested format.
 *
 * @pure true
 * @complexity O(v) where v = |violations|
 */
export function formatSummary(
	summary: LintSummary,
	format: ReportFormat,
	registry: RuleRegistry = BUILTIN_RULES,
): string {
	return match(format)
		.with("stylish", () => formatStylish(summary))
		.with("json", () => formatJson(summary))
		.with("sarif", () => formatSarif(summary, registry))
		.exhaustive();
}
