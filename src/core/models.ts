// CHANGE: Functional Core domain models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the linter process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1, 2}; 2 is reserved for fatal failures
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Minimal decision state for producing exit code from violation totals.
 *
 * @remarks
 * - @pure true
 * - @precondition counts are computed from the final report deterministically
 * - @invariant errorCount ≥ 0 ∧ warningCount ≥ 0
 */
export interface DecisionState {
	readonly errorCount: number;
	readonly warningCount: number;
	readonly maxWarnings?: number;
}
