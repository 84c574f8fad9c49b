// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the analyzer process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing the exit code of one run.
 *
 * @remarks
 * - @pure true
 * - @invariant cycles and export failures are not part of the decision
 */
export interface DecisionState {
	readonly discoveredFiles: number;
	readonly hasFatalError: boolean;
}
