// CHANGE: Encode review operations as Stash REST 1.0 requests
// PURITY: CORE
// INVARIANT: Every path is built from URI-encoded segments
// COMPLEXITY: O(n) where n = length of the file path

import { match } from "ts-pattern";

import type { LineAnchor, Mutation } from "../types/review.js";
import type {
	PullRequestState,
	PullRequestTarget,
	RepoTarget,
	RequestSpec,
} from "../types/stash.js";

function segment(value: string): string {
	return encodeURIComponent(value);
}

/**
 * Path of the repository resource.
 *
 * @pure true
 * @example
 * ```ts
 * repositoryPath({ host: "http://stash", namespace: "projects", project: "CORE", repo: "api" });
 * // "/rest/api/1.0/projects/CORE/repos/api"
 * ```
 */
export function repositoryPath(target: RepoTarget): string {
	return `/rest/api/1.0/${target.namespace}/${segment(target.project)}/repos/${segment(target.repo)}`;
}

function pullRequestPath(target: PullRequestTarget): string {
	return `${repositoryPath(target)}/pull-requests/${target.pr}`;
}

function get(path: string, query: Record<string, string> = {}): RequestSpec {
	return { method: "GET", path, query, body: null };
}

/**
 * Version token as sent in JSON bodies: numeric tokens become numbers.
 *
 * @pure true
 * @invariant Tokens a number cannot carry exactly (leading zeros, above 2^53) stay strings
 */
export function versionValue(version: string): number | string {
	if (!/^\d+$/u.test(version)) return version;
	const value = Number(version);
	return Number.isSafeInteger(value) && String(value) === version
		? value
		: version;
}

/**
 * Line number and side Stash expects for a comment anchor.
 *
 * @pure true
 * @invariant removed lines are addressed in the source file, all others in the destination file
 */
export function anchorBody(
	path: string,
	anchor: LineAnchor,
): Readonly<Record<string, unknown>> {
	const removed = anchor.kind === "removed";
	return {
		path,
		line: (removed ? anchor.oldLine : anchor.newLine) ?? 0,
		lineType: anchor.kind.toUpperCase(),
		fileType: removed ? "FROM" : "TO",
	};
}

export function fetchDiffRequest(
	target: PullRequestTarget,
	path: string,
): RequestSpec {
	const encoded = path.split("/").map(segment).join("/");
	return get(`${pullRequestPath(target)}/diff/${encoded}`);
}

export function listChangesRequest(target: PullRequestTarget): RequestSpec {
	return get(`${pullRequestPath(target)}/changes`, { limit: "1000" });
}

export function listPullRequestsRequest(
	target: RepoTarget,
	state: PullRequestState,
): RequestSpec {
	return get(`${repositoryPath(target)}/pull-requests`, {
		state: state.toUpperCase(),
		limit: "100",
	});
}

/**
 * Request that replays one mutation.
 *
 * @pure true
 * @postcondition Update/Delete requests carry the mutation's version token as `version` query parameter
 */
export function mutationRequest(
	target: PullRequestTarget,
	mutation: Mutation,
): RequestSpec {
	const comments = `${pullRequestPath(target)}/comments`;
	return match(mutation)
		.with(
			{ _tag: "Create" },
			({ path, anchor, text }): RequestSpec => ({
				method: "POST",
				path: comments,
				query: {},
				body: { text, anchor: anchorBody(path, anchor) },
			}),
		)
		.with(
			{ _tag: "Update" },
			({ identity, text }): RequestSpec => ({
				method: "PUT",
				path: `${comments}/${segment(identity.id)}`,
				query: { version: identity.version },
				body: { text, version: versionValue(identity.version) },
			}),
		)
		.with(
			{ _tag: "Delete" },
			({ identity }): RequestSpec => ({
				method: "DELETE",
				path: `${comments}/${segment(identity.id)}`,
				query: { version: identity.version },
				body: null,
			}),
		)
		.exhaustive();
}
