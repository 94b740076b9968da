// CHANGE: Human-readable report grouped by file
// FORMAT THEOREM: ∀ file f with violations: header(f) followed by one line per violation, then a blank line
// PURITY: CORE
// INVARIANT: Output is deterministic for a given summary
// COMPLEXITY: O(v) where v = |violations|

import type { FileReport, LintSummary, Violation } from "../types/index.js";

const SEVERITY_WIDTH = 7;

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function positionOf(violation: Violation): string {
	return `${violation.line}:${violation.column}`;
}

function formatFile(report: FileReport): string[] {
	const width = Math.max(
		...report.violations.map((violation) => positionOf(violation).length),
	);
	return [
		report.filePath,
		...report.violations.map(
			(violation) =>
				`  ${positionOf(violation).padEnd(width)}  ${violation.severity.padEnd(SEVERITY_WIDTH)}  ${violation.message}  ${violation.ruleId}`,
		),
		"",
	];
}

/**
 * Formats a summary as text for a terminal.
 *
 * @pure true
 *
 * @example
 * ```text
 * src/a.js
 *   1:10  error    Missing semicolon.  semicolon
 *
 * ✖ 1 problem (1 error, 0 warnings)
 * ```
 */
export function formatStylish(summary: LintSummary): string {
	const problems = summary.errorCount + summary.warningCount;
	if (problems === 0) return "✔ No style violations found.";
	const lines = summary.files
		.filter((report) => report.violations.length > 0)
		.flatMap(formatFile);
	lines.push(
		`✖ ${plural(problems, "problem")} (${plural(summary.errorCount, "error")}, ${plural(summary.warningCount, "warning")})`,
	);
	return lines.join("\n");
}
