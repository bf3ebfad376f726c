// CHANGE: Stash-backed implementations of the review ports
// PURITY: SHELL (network through StashTransport)
// INVARIANT: 404 on fetch → NotFoundError; 409 on update/delete → VersionConflict; other non-2xx → RemoteError
// COMPLEXITY: O(1) requests per operation

import { Effect, Either } from "effect";

import {
	NotFoundError,
	RemoteError,
	VersionConflict,
} from "../../core/errors.js";
import { describeMutation } from "../../core/review/describe.js";
import {
	decodeChanges,
	decodeDiff,
	decodeIdentity,
	decodePullRequests,
	errorMessage,
} from "../../core/stash/decode.js";
import {
	fetchDiffRequest,
	listChangesRequest,
	listPullRequestsRequest,
	mutationRequest,
} from "../../core/stash/requests.js";
import type { ReviewRemote, RepositoryRemote } from "../../core/types/ports.js";
import type { PullRequestTarget, RepoTarget } from "../../core/types/stash.js";
import type { HttpResponse, StashTransport } from "./http.js";

function isSuccess(response: HttpResponse): boolean {
	return response.status >= 200 && response.status < 300;
}

function failure(operation: string, response: HttpResponse): RemoteError {
	const message =
		errorMessage(response.body) ??
		(typeof response.body === "string" ? response.body : "no details");
	return new RemoteError({
		operation,
		status: response.status,
		detail: `HTTP ${response.status}: ${message}`,
	});
}

function expectSuccess(
	operation: string,
	response: HttpResponse,
): Effect.Effect<unknown, RemoteError> {
	return isSuccess(response)
		? Effect.succeed(response.body)
		: Effect.fail(failure(operation, response));
}

/**
 * Review port for one pull request.
 */
export function makeStashReview(
	transport: StashTransport,
	target: PullRequestTarget,
): ReviewRemote {
	return {
		fetchDiff: (path) =>
			transport.send("fetch diff", fetchDiffRequest(target, path)).pipe(
				Effect.flatMap(
					(response): Effect.Effect<unknown, NotFoundError | RemoteError> =>
						response.status === 404
							? Effect.fail(new NotFoundError({ path }))
							: expectSuccess("fetch diff", response),
				),
				Effect.flatMap((body) => decodeDiff(body, path)),
			),

		applyMutation: (mutation) => {
			const operation = describeMutation(mutation);
			return transport.send(operation, mutationRequest(target, mutation)).pipe(
				Effect.flatMap(
					(response): Effect.Effect<unknown, VersionConflict | RemoteError> =>
						response.status === 409
							? Effect.fail(
									new VersionConflict({
										mutation,
										detail:
											errorMessage(response.body) ??
											"comment was changed remotely",
									}),
								)
							: expectSuccess(operation, response),
				),
				Effect.map((body) =>
					mutation._tag === "Create"
						? Either.getOrNull(decodeIdentity(body))
						: null,
				),
			);
		},

		listChanges: () =>
			transport.send("list changes", listChangesRequest(target)).pipe(
				Effect.flatMap((response) => expectSuccess("list changes", response)),
				Effect.flatMap(decodeChanges),
			),
	};
}

/**
 * Listing port for one repository.
 */
export function makeStashRepository(
	transport: StashTransport,
	target: RepoTarget,
): RepositoryRemote {
	return {
		listPullRequests: (state) =>
			transport
				.send("list pull requests", listPullRequestsRequest(target, state))
				.pipe(
					Effect.flatMap((response) =>
						expectSuccess("list pull requests", response),
					),
					Effect.flatMap(decodePullRequests),
				),
	};
}
