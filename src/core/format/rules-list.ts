// CHANGE: Text listing of the registry for --list-rules
// PURITY: CORE

import { BUILTIN_RULES, listRules } from "../rules/index.js";
import type { RuleRegistry } from "../types/index.js";

/**
 * One line per rule: id, default severity, description.
 *
 * @pure true
 */
export function formatRuleList(registry: RuleRegistry = BUILTIN_RULES): string {
	const rules = listRules(registry);
	const idWidth = Math.max(...rules.map((rule) => rule.id.length));
	return [
		"📋 Available rules:",
		...rules.map(
			(rule) =>
				`  ${rule.id.padEnd(idWidth)}  ${rule.defaultSeverity.padEnd(7)}  ${rule.description}`,
		),
	].join("\n");
}
