// FORMAT THEOREM: ∀s ∈ State: (s.hasFatalError ∨ s.discoveredFiles = 0) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes the process exit code from the outcome of a run.
 *
 * @param state - Immutable flags computed by the application layer
 * @returns 1 when nothing was discovered or a fatal error occurred; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ discoveredFiles: 0, hasFatalError: false }); // 1
 * computeExitCode({ discoveredFiles: 12, hasFatalError: false }); // 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasFatalError || s.discoveredFiles === 0,
		(failed): ExitCode => (failed ? 1 : 0),
	);
