export {
	type DirectiveIndex,
	type DirectiveRules,
	isSuppressed,
	type LineDirective,
	parseDirectives,
	parseRuleList,
	type RangeDirective,
} from "./directives.js";
export { evaluateModel, lintText, runRule, toViolation } from "./evaluator.js";
