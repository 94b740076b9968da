// CHANGE: Pure decision function computing the exit code from report totals
// FORMAT THEOREM: ∀s: (s.errorCount > 0 ∨ (s.maxWarnings ≠ ⊥ ∧ s.warningCount > s.maxWarnings)) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Whether the warning budget given by `--max-warnings` is exhausted.
 *
 * @pure true
 * @invariant maxWarnings undefined → false
 */
export const exceedsWarningBudget = (state: DecisionState): boolean =>
	state.maxWarnings !== undefined && state.warningCount > state.maxWarnings;

/**
 * Computes process exit code from violation totals (pure function).
 *
 * @returns 1 if there are errors or too many warnings; otherwise 0
 *
 * @pure true
 * @invariant result ∈ {0,1}; fatal exit 2 is decided by the APP layer
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ errorCount: 0, warningCount: 3, maxWarnings: 2 });
 * // => 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.errorCount > 0 || exceedsWarningBudget(s),
		(failed): ExitCode => (failed ? 1 : 0),
	);
