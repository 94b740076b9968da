export {
	DEFAULT_EXTENSIONS,
	defaultLinterConfig,
	defaultRuleSetting,
	defaultRuleSettings,
	parseSeverity,
	resolveLinterConfig,
	resolveRuleSetting,
	resolveRuleSettings,
} from "./resolve.js";
