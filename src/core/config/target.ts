// CHANGE: Resolve pull-request and repository targets from URLs or shorthands
// PURITY: CORE
// INVARIANT: Resolved host has a scheme and no trailing slash
// COMPLEXITY: O(n) where n = length of the target

import { Either } from "effect";

import { UsageError } from "../errors.js";
import type { PullRequestTarget, RepoTarget } from "../types/stash.js";

const STASH_URL_PATTERN =
	/^(https?:\/\/.*?)\/(users|projects)\/([^/]+)\/repos\/([^/]+)(?:\/pull-requests\/(\d+))?/u;

export const URL_EXAMPLE =
	"http[s]://<host>/(users|projects)/<project>/repos/<repo>/pull-requests/<id>";

/**
 * Defaults that complete a shorthand target.
 *
 * @property project Either `<project>` or `<project>/<repo>`
 */
export interface TargetDefaults {
	readonly host: string | null;
	readonly project: string | null;
}

interface RepoParts {
	readonly project: string;
	readonly repo: string;
}

/**
 * Adds a scheme to a bare host name and drops trailing slashes.
 *
 * @pure true
 */
export function normalizeHost(host: string): string {
	const withScheme = /^https?:\/\//u.test(host) ? host : `http://${host}`;
	return withScheme.replace(/\/+$/u, "");
}

function splitProject(project: string): Pick<RepoTarget, "namespace" | "project"> {
	const personal = project.startsWith("~") || project.startsWith("%");
	return personal
		? { namespace: "users", project: project.slice(1) }
		: { namespace: "projects", project };
}

function parsePullRequestId(value: string | undefined): number | null {
	if (value === undefined || !/^\d+$/u.test(value)) return null;
	const id = Number.parseInt(value, 10);
	return id > 0 ? id : null;
}

function shorthandError(kind: "pull request" | "repository", shape: string): UsageError {
	return new UsageError({
		detail: `${kind} should be given as a URL (${URL_EXAMPLE}) or as ${shape}`,
	});
}

function repoFromDefaults(
	project: string | null,
): RepoParts | { readonly project: string; readonly repo: null } | null {
	if (project === null) return null;
	const [key = "", repo] = project.split("/");
	return repo === undefined || repo.length === 0
		? { project: key, repo: null }
		: { project: key, repo };
}

function shorthandPullRequest(
	parts: readonly string[],
	defaults: TargetDefaults,
): (RepoParts & { readonly pr: number | null }) | null {
	const fromDefaults = repoFromDefaults(defaults.project);
	if (parts.length >= 3) {
		const [project = "", repo = "", pr] = parts;
		return { project, repo, pr: parsePullRequestId(pr) };
	}
	if (parts.length === 2 && fromDefaults !== null) {
		const [repo = "", pr] = parts;
		return { project: fromDefaults.project, repo, pr: parsePullRequestId(pr) };
	}
	if (parts.length === 1 && fromDefaults !== null && fromDefaults.repo !== null) {
		return {
			project: fromDefaults.project,
			repo: fromDefaults.repo,
			pr: parsePullRequestId(parts[0]),
		};
	}
	return null;
}

function shorthandRepository(
	parts: readonly string[],
	defaults: TargetDefaults,
): RepoParts | null {
	if (parts.length === 2) {
		const [project = "", repo = ""] = parts;
		return { project, repo };
	}
	const fromDefaults = repoFromDefaults(defaults.project);
	if (parts.length === 1 && fromDefaults !== null) {
		return { project: fromDefaults.project, repo: parts[0] ?? "" };
	}
	return null;
}

function complete(parts: RepoParts): boolean {
	return parts.project.length > 0 && parts.repo.length > 0;
}

/**
 * Resolves the target of `review` and `ls`.
 *
 * @pure true
 * @example
 * ```ts
 * resolvePullRequest("~jane/dotfiles/3", { host: "stash.local", project: null });
 * // Right({ host: "http://stash.local", namespace: "users", project: "jane", repo: "dotfiles", pr: 3 })
 * ```
 */
export function resolvePullRequest(
	raw: string,
	defaults: TargetDefaults,
): Either.Either<PullRequestTarget, UsageError> {
	const url = STASH_URL_PATTERN.exec(raw);
	if (url !== null) {
		const pr = parsePullRequestId(url[5]);
		if (pr === null) {
			return Either.left(shorthandError("pull request", "<project>/<repo>/<pr>"));
		}
		return Either.right({
			host: normalizeHost(url[1] ?? ""),
			namespace: url[2] === "users" ? "users" : "projects",
			project: url[3] ?? "",
			repo: url[4] ?? "",
			pr,
		});
	}

	if (defaults.host === null) {
		return Either.left(
			new UsageError({ detail: "--host is required for shorthand targets" }),
		);
	}

	const parts = shorthandPullRequest(raw.split("/"), defaults);
	if (parts === null || parts.pr === null || !complete(parts)) {
		return Either.left(shorthandError("pull request", "<project>/<repo>/<pr>"));
	}
	return Either.right({
		host: normalizeHost(defaults.host),
		...splitProject(parts.project),
		repo: parts.repo,
		pr: parts.pr,
	});
}

/**
 * Resolves the target of `ls-reviews`.
 *
 * @pure true
 */
export function resolveRepository(
	raw: string,
	defaults: TargetDefaults,
): Either.Either<RepoTarget, UsageError> {
	const url = STASH_URL_PATTERN.exec(raw);
	if (url !== null) {
		return Either.right({
			host: normalizeHost(url[1] ?? ""),
			namespace: url[2] === "users" ? "users" : "projects",
			project: url[3] ?? "",
			repo: url[4] ?? "",
		});
	}

	if (defaults.host === null) {
		return Either.left(
			new UsageError({ detail: "--host is required for shorthand targets" }),
		);
	}

	const parts = shorthandRepository(raw.split("/"), defaults);
	if (parts === null || !complete(parts)) {
		return Either.left(shorthandError("repository", "<project>/<repo>"));
	}
	return Either.right({
		host: normalizeHost(defaults.host),
		...splitProject(parts.project),
		repo: parts.repo,
	});
}
