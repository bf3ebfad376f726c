// CHANGE: Sequential replay of a change set against the review service
// PURITY: SHELL (remote calls through ReviewRemote)
// INVARIANT: Mutations are attempted in the given order; a VersionConflict skips one, any other failure stops
// COMPLEXITY: O(n) remote calls where n = mutations

import { Effect, Either } from "effect";

import type { VersionConflict } from "../../core/errors.js";
import type { ApplyReport } from "../../core/models.js";
import { describeMutation } from "../../core/review/describe.js";
import type { ReviewRemote } from "../../core/types/ports.js";
import type { Mutation } from "../../core/types/review.js";

export type ProgressReporter = (
	position: number,
	total: number,
	mutation: Mutation,
) => Effect.Effect<void>;

/**
 * Applies mutations one by one.
 *
 * @param remote Review service
 * @param mutations Output of diffReviews
 * @param onProgress Called before each attempt with a 1-based position
 * @returns Report; never fails, failures are recorded in the report
 *
 * @pure false (remote side effects)
 * @postcondition Mutations applied before a halt stay applied
 */
export function applyMutations(
	remote: Pick<ReviewRemote, "applyMutation">,
	mutations: readonly Mutation[],
	onProgress: ProgressReporter = () => Effect.void,
): Effect.Effect<ApplyReport> {
	return Effect.gen(function* () {
		const total = mutations.length;
		const applied: Mutation[] = [];
		const conflicts: VersionConflict[] = [];

		for (const [index, mutation] of mutations.entries()) {
			yield* onProgress(index + 1, total, mutation);
			const result = yield* Effect.either(remote.applyMutation(mutation));

			if (Either.isRight(result)) {
				applied.push(mutation);
				yield* Effect.logDebug(`applied: ${describeMutation(mutation)}`);
				continue;
			}

			const error = result.left;
			if (error._tag === "VersionConflict") {
				conflicts.push(error);
				yield* Effect.logWarning(
					`${describeMutation(mutation)} rejected: ${error.detail}`,
				);
				continue;
			}

			yield* Effect.logError(
				`${describeMutation(mutation)} failed: ${error.detail}`,
			);
			return {
				total,
				applied,
				conflicts,
				halted: { mutation, error, remaining: total - index - 1 },
			};
		}

		return { total, applied, conflicts, halted: null };
	});
}
