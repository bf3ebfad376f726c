// CHANGE: Functional Core models for applying a change set
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { RemoteError, VersionConflict } from "./errors.js";
import type { Mutation } from "./types/review.js";

/**
 * Exit code of the process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Mutation whose application failed with an unclassified error; nothing after
 * it was attempted.
 */
export interface HaltedApply {
	readonly mutation: Mutation;
	readonly error: RemoteError;
	readonly remaining: number;
}

/**
 * Outcome of replaying a change set.
 *
 * @remarks
 * - @invariant applied.length + conflicts.length + (halted ? 1 + halted.remaining : 0) = total
 */
export interface ApplyReport {
	readonly total: number;
	readonly applied: readonly Mutation[];
	readonly conflicts: readonly VersionConflict[];
	readonly halted: HaltedApply | null;
}
