// CHANGE: Pure decision function to compute exit code using Effect
// WHY: Centralize termination logic in Functional Core
// FORMAT THEOREM: ∀s: computeExitCode(s) = 1 ↔ s.fatal ∨ (s.failOnViolations ∧ s.hasViolations)
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from run state (pure function).
 *
 * Reported violations alone never fail the run; only a fatal error or
 * `--check` with remaining violations does.
 *
 * @param state - Immutable flags computed from the run
 * @returns 1 on fatal error or checked violations; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ fatal: false, hasViolations: true, failOnViolations: false });
 * // => 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.fatal || (s.failOnViolations && s.hasViolations),
		(failed): ExitCode => (failed ? 1 : 0),
	);

