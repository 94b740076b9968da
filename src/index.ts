// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: SHELL internals stay private; only APP orchestration and CORE utilities are exported
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Linter orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runLinter } from "guidelint";
 *
 * const exitCode = await Effect.runPromise(
 *   runLinter({ targetPaths: ["src"], format: "stylish", quiet: false, listRules: false }),
 * );
 * ```
 *
 * @returns Effect of ExitCode (0 = clean, 1 = violations, 2 = fatal)
 */
export { describeAppError, runLinter } from "./app/runLinter.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	AnyRule,
	CLIOptions,
	Comment,
	FileReport,
	JSONValue,
	LinterConfig,
	LintSummary,
	ReportFormat,
	ResolvedRuleSettings,
	Rule,
	RuleFinding,
	RuleId,
	RuleOptionsMap,
	RuleRegistry,
	RuleSetting,
	RuleSeverity,
	SarifReport,
	Severity,
	StatementBoundary,
	SyntacticModel,
	Token,
	TokenKind,
	Violation,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { defaultLinterConfig, resolveLinterConfig } from "./core/config/index.js";
export { computeExitCode } from "./core/decision.js";
export { evaluateModel, lintText } from "./core/evaluate/index.js";
export {
	dropWarnings,
	formatSummary,
	summarize,
	toSarif,
} from "./core/format/index.js";
export {
	BUILTIN_RULES,
	getRule,
	isRuleId,
	listRules,
	RULE_IDS,
} from "./core/rules/index.js";
export { scanSource } from "./core/scanner/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS (Effect Data.TaggedError)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	ConfigError,
	FSError,
	InvariantViolation,
	UsageError,
} from "./core/errors.js";
