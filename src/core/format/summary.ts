// CHANGE: Aggregation of violations into file reports and run summaries
// PURITY: CORE
// INVARIANT: Totals always equal the counts of the contained violations
// COMPLEXITY: O(v) where v = |violations|

import type { FileReport, LintSummary, Violation } from "../types/index.js";
import { isError } from "../types/index.js";

function compareRuleIds(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/**
 * Orders violations by line, then column, then rule id.
 *
 * @pure true
 * @complexity O(v log v)
 */
export function sortViolations(
	violations: ReadonlyArray<Violation>,
): ReadonlyArray<Violation> {
	return [...violations].sort(
		(a, b) =>
			a.line - b.line ||
			a.column - b.column ||
			compareRuleIds(a.ruleId, b.ruleId),
	);
}

export function buildFileReport(
	filePath: string,
	violations: ReadonlyArray<Violation>,
): FileReport {
	const sorted = sortViolations(violations);
	const errorCount = sorted.filter(isError).length;
	return {
		filePath,
		violations: sorted,
		errorCount,
		warningCount: sorted.length - errorCount,
	};
}

/**
 * Folds per-file reports into the run summary.
 *
 * @pure true
 * @invariant result.fileCount = |reports|
 */
export function summarize(reports: ReadonlyArray<FileReport>): LintSummary {
	return {
		files: reports,
		fileCount: reports.length,
		errorCount: reports.reduce((sum, report) => sum + report.errorCount, 0),
		warningCount: reports.reduce((sum, report) => sum + report.warningCount, 0),
	};
}

/**
 * Summary restricted to errors, as shown with `--quiet`.
 */
export function dropWarnings(summary: LintSummary): LintSummary {
	return summarize(
		summary.files.map((report) =>
			buildFileReport(report.filePath, report.violations.filter(isError)),
		),
	);
}
