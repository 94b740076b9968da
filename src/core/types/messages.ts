// CHANGE: Violation and report types shared by evaluator and reporters
// PURITY: CORE
// INVARIANT: All records are readonly; created once, never mutated

import type { RuleId } from "./rule.js";

/**
 * Severity a rule can be configured with.
 */
export type Severity = "error" | "warning";

/**
 * Configured state of a rule; "off" disables it.
 */
export type RuleSeverity = Severity | "off";

/**
 * Pseudo rule id for files the parser rejects.
 */
export const PARSE_ERROR_RULE_ID = "parse-error";

export type ViolationRuleId = RuleId | typeof PARSE_ERROR_RULE_ID;

/**
 * Raw location emitted by a rule's check.
 *
 * @invariant line ≥ 1 ∧ column ≥ 1
 */
export interface RuleFinding {
	readonly line: number;
	readonly column: number;
	readonly endLine?: number;
	readonly endColumn?: number;
	/** Overrides the rule's default message. */
	readonly message?: string;
}

/**
 * Single style violation.
 *
 * @invariant line ≥ 1 ∧ column ≥ 1 ∧ message.length > 0
 */
export interface Violation {
	readonly ruleId: ViolationRuleId;
	readonly severity: Severity;
	readonly message: string;
	readonly line: number;
	readonly column: number;
	readonly endLine?: number;
	readonly endColumn?: number;
}

/**
 * Result of linting one file.
 *
 * @invariant errorCount + warningCount === violations.length
 */
export interface FileReport {
	readonly filePath: string;
	readonly violations: ReadonlyArray<Violation>;
	readonly errorCount: number;
	readonly warningCount: number;
}

/**
 * Aggregate result of a run.
 *
 * @invariant errorCount = Σ files.errorCount ∧ warningCount = Σ files.warningCount
 */
export interface LintSummary {
	readonly files: ReadonlyArray<FileReport>;
	readonly fileCount: number;
	readonly errorCount: number;
	readonly warningCount: number;
}

/**
 * Checks whether a violation is an error
 *
 * @pure true
 * @complexity O(1)
 */
export function isError(violation: Violation): boolean {
	return violation.severity === "error";
}
