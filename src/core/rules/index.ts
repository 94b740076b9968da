export { BRACE_MESSAGES, braceStyleRule } from "./brace-style.js";
export { eqeqeqRule } from "./eqeqeq.js";
export { indentationRule } from "./indentation.js";
export {
	matchesCase,
	type NameCase,
	namingConventionRule,
	stripAllowedPrefix,
} from "./naming-convention.js";
export { isScriptSource, noImplicitGlobalsRule } from "./no-implicit-globals.js";
export type { OptionReader } from "./options.js";
export {
	booleanOption,
	enumOption,
	positiveIntegerOption,
	readOption,
	rejectUnknownKeys,
	stringArrayOption,
} from "./options.js";
export { quoteStyleRule } from "./quote-style.js";
export {
	BUILTIN_RULES,
	getRule,
	isRuleId,
	listRules,
	RULE_IDS,
} from "./registry.js";
export { semicolonRule } from "./semicolon.js";
