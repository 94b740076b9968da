// CHANGE: Registry of the built-in rules
// PURITY: CORE
// INVARIANT: Registry and rules are frozen; RULE_IDS fixes evaluation and listing order
// COMPLEXITY: O(1) per lookup

import type { AnyRule, Rule, RuleId, RuleRegistry } from "../types/index.js";
import { braceStyleRule } from "./brace-style.js";
import { eqeqeqRule } from "./eqeqeq.js";
import { indentationRule } from "./indentation.js";
import { namingConventionRule } from "./naming-convention.js";
import { noImplicitGlobalsRule } from "./no-implicit-globals.js";
import { quoteStyleRule } from "./quote-style.js";
import { semicolonRule } from "./semicolon.js";

export const RULE_IDS: ReadonlyArray<RuleId> = Object.freeze([
	"naming-convention",
	"brace-style",
	"quote-style",
	"indentation",
	"semicolon",
	"eqeqeq",
	"no-implicit-globals",
] as const);

export const BUILTIN_RULES: RuleRegistry = Object.freeze({
	"naming-convention": Object.freeze(namingConventionRule),
	"brace-style": Object.freeze(braceStyleRule),
	"quote-style": Object.freeze(quoteStyleRule),
	indentation: Object.freeze(indentationRule),
	semicolon: Object.freeze(semicolonRule),
	eqeqeq: Object.freeze(eqeqeqRule),
	"no-implicit-globals": Object.freeze(noImplicitGlobalsRule),
});

/**
 * Narrows an arbitrary string (config key, CLI value) to a known rule id.
 *
 * @pure true
 */
export function isRuleId(value: string): value is RuleId {
	return RULE_IDS.some((id) => id === value);
}

export function getRule<K extends RuleId>(
	id: K,
	registry: RuleRegistry = BUILTIN_RULES,
): Rule<K> {
	return registry[id];
}

/**
 * Rules in registry order.
 */
export function listRules(
	registry: RuleRegistry = BUILTIN_RULES,
): ReadonlyArray<AnyRule> {
	return RULE_IDS.map((id) => registry[id]);
}
