// CHANGE: Pure decision functions turning an apply report into an exit code
// FORMAT THEOREM: ∀r ∈ ApplyReport: (r.halted ≠ null ∨ r.conflicts ≠ ∅) ↔ computeExitCode(r) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping ApplyReport → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { ApplyReport, ExitCode } from "./models.js";

/**
 * Whether every mutation of the change set reached the review service.
 *
 * @pure true
 */
export const isComplete = (report: ApplyReport): boolean =>
	report.halted === null && report.conflicts.length === 0;

/**
 * Computes process exit code from an apply report (pure function).
 *
 * @returns 0 when every mutation was applied; otherwise 1
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ total: 1, applied: [m], conflicts: [], halted: null });
 * // 0
 * ```
 */
export const computeExitCode = (report: ApplyReport): ExitCode =>
	pipe(report, isComplete, (complete): ExitCode => (complete ? 0 : 1));
