// CHANGE: Ports through which the review session reaches the outside world
// PURITY: CORE (interfaces only)
// INVARIANT: CORE never implements a port; SHELL does, tests fake them in-process
// COMPLEXITY: O(1)

import type { Effect } from "effect";

import type {
	DecodeError,
	EditorError,
	FSError,
	NotFoundError,
	RemoteError,
	VersionConflict,
} from "../errors.js";
import type { DiffModel, Identity, Mutation } from "./review.js";
import type { ChangedFile, PullRequestState, PullRequestSummary } from "./stash.js";

/**
 * Review service bound to one pull request.
 */
export interface ReviewRemote {
	readonly fetchDiff: (
		path: string,
	) => Effect.Effect<DiffModel, NotFoundError | DecodeError | RemoteError>;
	/**
	 * Replays one mutation.
	 *
	 * @returns Identity assigned to a created comment, null for update/delete
	 */
	readonly applyMutation: (
		mutation: Mutation,
	) => Effect.Effect<Identity | null, VersionConflict | RemoteError>;
	readonly listChanges: () => Effect.Effect<
		readonly ChangedFile[],
		DecodeError | RemoteError
	>;
}

/**
 * Pull-request listing of one repository.
 */
export interface RepositoryRemote {
	readonly listPullRequests: (
		state: PullRequestState,
	) => Effect.Effect<readonly PullRequestSummary[], DecodeError | RemoteError>;
}

/**
 * External editor.
 *
 * @returns Exit status of the editor process
 */
export interface EditorPort {
	/** Command line the editor is started with. */
	readonly command: string;
	readonly runEditor: (filePath: string) => Effect.Effect<number, EditorError>;
}

/**
 * Storage of the edited document between render and parse.
 */
export interface ReviewFiles {
	readonly create: (text: string) => Effect.Effect<string, FSError>;
	readonly read: (path: string) => Effect.Effect<string, FSError>;
	readonly remove: (path: string) => Effect.Effect<void, FSError>;
}
