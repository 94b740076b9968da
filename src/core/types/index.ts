// CHANGE: Central export file for all type definitions
// PURITY: Re-exports only

export type { CLIOptions, LinterConfig, ReportFormat } from "./config.js";
export type { JSONObject, JSONValue } from "./json.js";
export { describeJSONType, isJSONArray, isJSONObject } from "./json.js";
export type {
	FileReport,
	LintSummary,
	RuleFinding,
	RuleSeverity,
	Severity,
	Violation,
	ViolationRuleId,
} from "./messages.js";
export { isError, PARSE_ERROR_RULE_ID } from "./messages.js";
export type {
	AnyRule,
	BraceStyleOptions,
	EqeqeqOptions,
	IndentationOptions,
	NamingConventionOptions,
	NoImplicitGlobalsOptions,
	QuoteStyleOptions,
	ResolvedRuleSettings,
	Rule,
	RuleId,
	RuleOptionsMap,
	RuleRegistry,
	RuleSetting,
	SemicolonOptions,
} from "./rule.js";
export type {
	SarifLevel,
	SarifLocation,
	SarifReport,
	SarifResult,
	SarifRuleDescriptor,
} from "./sarif.js";
export type {
	Comment,
	Position,
	Span,
	StatementBoundary,
	SyntacticModel,
	SyntaxErrorInfo,
	Token,
	TokenKind,
} from "./syntax.js";
