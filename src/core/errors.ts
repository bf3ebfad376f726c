// CHANGE: Typed domain error ADT for the review session using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { Mutation } from "./types/review.js";

/**
 * Edited document cannot be turned back into a diff model.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class MalformedDocument extends Data.TaggedError("MalformedDocument")<{
	readonly detail: string;
}> {}

/**
 * Requested path is not part of the pull request.
 *
 * @pure true (Data class)
 */
export class NotFoundError extends Data.TaggedError("NotFound")<{
	readonly path: string;
}> {}

/**
 * Remote state changed since the diff was fetched.
 *
 * @pure true (Data class)
 */
export class VersionConflict extends Data.TaggedError("VersionConflict")<{
	readonly mutation: Mutation;
	readonly detail: string;
}> {}

/**
 * Review service answered with an unexpected status or could not be reached.
 *
 * @pure true (Data class)
 * @invariant status = null ⇔ no HTTP response was received
 */
export class RemoteError extends Data.TaggedError("RemoteError")<{
	readonly operation: string;
	readonly status: number | null;
	readonly detail: string;
}> {}

/**
 * Review service answered with JSON of an unexpected shape.
 *
 * @pure true (Data class)
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly entity: "diff" | "changes" | "pull-requests" | "comment";
	readonly detail: string;
}> {}

/**
 * Editor could not be started or was terminated abnormally.
 *
 * @pure true (Data class)
 */
export class EditorError extends Data.TaggedError("EditorError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Command line could not be understood.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| MalformedDocument
	| NotFoundError
	| VersionConflict
	| RemoteError
	| DecodeError
	| EditorError
	| FSError
	| UsageError;
