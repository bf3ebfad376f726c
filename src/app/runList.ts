// CHANGE: Listing commands `ls` and `ls-reviews`
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// COMPLEXITY: O(n) where n = listed entries

import { Effect } from "effect";

import { describeError } from "../core/format/error.js";
import type { ExitCode } from "../core/models.js";
import { formatChangedFile, formatPullRequest } from "../core/stash/format.js";
import type { ReviewRemote, RepositoryRemote } from "../core/types/ports.js";
import type { PullRequestState } from "../core/types/stash.js";
import type { Printer } from "./runReview.js";

/**
 * Prints the files changed by a pull request.
 */
export function runListFiles(
	remote: Pick<ReviewRemote, "listChanges">,
	print: Printer,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const files = yield* remote.listChanges();
		yield* Effect.logDebug(`pull request changes ${files.length} files`);
		for (const file of files) {
			yield* print(formatChangedFile(file));
		}
		return 0 as const;
	}).pipe(
		Effect.catchAll((error) =>
			Effect.logError(describeError(error)).pipe(Effect.as<ExitCode>(1)),
		),
	);
}

/**
 * Prints the pull requests of a repository in the given state.
 */
export function runListReviews(
	remote: RepositoryRemote,
	state: PullRequestState,
	withDescriptions: boolean,
	print: Printer,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const pullRequests = yield* remote.listPullRequests(state);
		for (const pr of pullRequests) {
			for (const line of formatPullRequest(pr, withDescriptions)) {
				yield* print(line);
			}
		}
		return 0 as const;
	}).pipe(
		Effect.catchAll((error) =>
			Effect.logError(describeError(error)).pipe(Effect.as<ExitCode>(1)),
		),
	);
}
