// CHANGE: Machine-readable JSON report
// PURITY: CORE
// INVARIANT: JSON.parse(formatJson(s)) deep-equals s

import type { LintSummary } from "../types/index.js";

export function formatJson(summary: LintSummary): string {
	return JSON.stringify(summary, null, 2);
}
