// CHANGE: Types describing the Bitbucket Server (Stash) resources used by the CLI
// PURITY: CORE
// COMPLEXITY: O(1)

/**
 * Repository on a Stash server.
 *
 * @property host Base URL with scheme and without trailing slash
 * @property namespace `projects` for project repositories, `users` for personal ones
 */
export interface RepoTarget {
	readonly host: string;
	readonly namespace: "projects" | "users";
	readonly project: string;
	readonly repo: string;
}

/**
 * Pull request of a repository.
 *
 * @invariant pr > 0
 */
export interface PullRequestTarget extends RepoTarget {
	readonly pr: number;
}

/**
 * File changed by a pull request.
 */
export interface ChangedFile {
	readonly path: string;
	readonly changeType: string;
	readonly executableBefore: boolean;
	readonly executableAfter: boolean;
}

export type PullRequestState = "open" | "merged" | "declined";

/**
 * Pull request as listed for a repository.
 *
 * @property updatedAt Milliseconds since epoch
 * @property sourceRef Full ref name of the source branch, e.g. `refs/heads/feature/x`
 */
export interface PullRequestSummary {
	readonly id: number;
	readonly state: string;
	readonly updatedAt: number;
	readonly author: string;
	readonly sourceRef: string;
	readonly description: string;
}

/**
 * HTTP request relative to the server host.
 *
 * @invariant path starts with `/rest/api/1.0/`
 */
export interface RequestSpec {
	readonly method: "GET" | "POST" | "PUT" | "DELETE";
	readonly path: string;
	readonly query: Readonly<Record<string, string>>;
	readonly body: Readonly<Record<string, unknown>> | null;
}
