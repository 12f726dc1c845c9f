// CHANGE: Pure decision function computing the gate exit code using Effect pipe
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (∃v ∈ s.verdicts: ¬v.passed) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(n) time / O(1) space where n = |verdicts|

import { pipe } from "effect";

import type { CheckVerdict, DecisionState, ExitCode } from "./models.js";

/**
 * Aggregate pass: every verdict passed (vacuously true for none).
 *
 * @pure true
 */
export const allPassed = (verdicts: readonly CheckVerdict[]): boolean =>
	verdicts.every((v) => v.passed);

/**
 * Computes process exit code from the collected verdicts.
 *
 * @param state - Immutable verdicts of one run
 * @returns 1 if any checker failed; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition state.verdicts = ∅ → result = 0
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ verdicts: [{ checker: "style", passed: false, remediations: [] }] });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state.verdicts,
		allPassed,
		(passed): ExitCode => (passed ? 0 : 1),
	);
