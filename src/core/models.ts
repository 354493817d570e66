// CHANGE: Functional Core domain models (pure, immutable)
// WHY: FCIS separation: CORE contains only pure types/functions and invariants
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the census process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing exit code from a run.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly fatal: boolean;
	readonly hasViolations: boolean;
	readonly failOnViolations: boolean;
}
