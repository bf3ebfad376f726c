// CHANGE: Decode Stash REST payloads into domain values
// PURITY: CORE
// INVARIANT: Unknown JSON is narrowed by type guards; no casts
// COMPLEXITY: O(n) where n = size of the payload

import { Either } from "effect";

import { DecodeError, NotFoundError } from "../errors.js";
import type {
	Annotation,
	DiffLine,
	DiffModel,
	Hunk,
	Identity,
	LineKind,
} from "../types/review.js";
import type { ChangedFile, PullRequestSummary } from "../types/stash.js";

type JSONObject = { readonly [key: string]: unknown };

const EMPTY: JSONObject = {};

function isJSONObject(value: unknown): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function arrayField(object: JSONObject, key: string): readonly unknown[] {
	const value = object[key];
	return Array.isArray(value) ? value : [];
}

function numberField(object: JSONObject, key: string): number | null {
	const value = object[key];
	return typeof value === "number" ? value : null;
}

function stringField(object: JSONObject, key: string): string | null {
	const value = object[key];
	return typeof value === "string" ? value : null;
}

function objectField(object: JSONObject, key: string): JSONObject | null {
	const value = object[key];
	return isJSONObject(value) ? value : null;
}

function tokenOf(value: unknown): string | null {
	if (typeof value === "number") return String(value);
	if (typeof value === "string" && value.length > 0) return value;
	return null;
}

const SEGMENT_KINDS: Readonly<Record<string, LineKind>> = {
	CONTEXT: "context",
	ADDED: "added",
	REMOVED: "removed",
};

class PayloadError extends Error {}

function need<A>(value: A | null, what: string): A {
	if (value === null) throw new PayloadError(what);
	return value;
}

/**
 * Decodes a comment id/version pair.
 *
 * @pure true
 */
export function decodeIdentity(json: unknown): Either.Either<Identity, DecodeError> {
	if (!isJSONObject(json)) {
		return Either.left(
			new DecodeError({ entity: "comment", detail: "comment is not an object" }),
		);
	}
	const id = tokenOf(json["id"]);
	const version = tokenOf(json["version"]);
	if (id === null || version === null) {
		return Either.left(
			new DecodeError({
				entity: "comment",
				detail: "comment has no id or version",
			}),
		);
	}
	return Either.right({ id, version });
}

function decodeComments(diff: JSONObject): ReadonlyMap<string, Annotation> {
	const comments = new Map<string, Annotation>();
	for (const raw of arrayField(diff, "lineComments")) {
		if (!isJSONObject(raw)) continue;
		const identity = decodeIdentity(raw);
		const text = stringField(raw, "text");
		if (Either.isRight(identity) && text !== null) {
			comments.set(identity.right.id, {
				identity: identity.right,
				text: text.replace(/\r\n/gu, "\n"),
			});
		}
	}
	return comments;
}

function decodeLine(
	raw: unknown,
	kind: LineKind,
	comments: ReadonlyMap<string, Annotation>,
): DiffLine {
	const line = need(isJSONObject(raw) ? raw : null, "diff line");
	const source = numberField(line, "source");
	const destination = numberField(line, "destination");
	const annotations = arrayField(line, "commentIds")
		.map(tokenOf)
		.flatMap((id) => {
			const comment = id === null ? undefined : comments.get(id);
			return comment === undefined ? [] : [comment];
		});
	return {
		kind,
		text: need(stringField(line, "line"), "line text"),
		oldLine: kind === "added" ? null : need(source, "source line"),
		newLine: kind === "removed" ? null : need(destination, "destination line"),
		annotations,
	};
}

function decodeHunk(
	raw: unknown,
	comments: ReadonlyMap<string, Annotation>,
): Hunk {
	const hunk = need(isJSONObject(raw) ? raw : null, "hunk");
	const lines = arrayField(hunk, "segments").flatMap((rawSegment) => {
		const segment = need(
			isJSONObject(rawSegment) ? rawSegment : null,
			"segment",
		);
		const type = need(stringField(segment, "type"), "segment type");
		const kind = need(SEGMENT_KINDS[type] ?? null, `segment type ${type}`);
		return arrayField(segment, "lines").map((line) =>
			decodeLine(line, kind, comments),
		);
	});
	return {
		oldStart: need(numberField(hunk, "sourceLine"), "sourceLine"),
		oldCount: need(numberField(hunk, "sourceSpan"), "sourceSpan"),
		newStart: need(numberField(hunk, "destinationLine"), "destinationLine"),
		newCount: need(numberField(hunk, "destinationSpan"), "destinationSpan"),
		section: stringField(hunk, "context") ?? "",
		lines,
	};
}

function diffPath(diff: JSONObject, fallback: string): string {
	const destination = objectField(diff, "destination");
	const source = objectField(diff, "source");
	return (
		(destination === null ? null : stringField(destination, "toString")) ??
		(source === null ? null : stringField(source, "toString")) ??
		fallback
	);
}

function guard<A>(
	entity: DecodeError["entity"],
	decode: () => A,
): Either.Either<A, DecodeError> {
	try {
		return Either.right(decode());
	} catch (error) {
		if (error instanceof PayloadError) {
			return Either.left(
				new DecodeError({ entity, detail: `missing or invalid ${error.message}` }),
			);
		}
		throw error;
	}
}

/**
 * Decodes the diff of one file with its line comments.
 *
 * @param json Body of `GET …/pull-requests/<id>/diff/<path>`
 * @param path Requested path, used when the payload names no file
 * @returns Model, NotFoundError when the diff has no hunks, DecodeError on unexpected shapes
 *
 * @pure true
 * @invariant Comments appear under each line in the order of its `commentIds`
 */
export function decodeDiff(
	json: unknown,
	path: string,
): Either.Either<DiffModel, DecodeError | NotFoundError> {
	if (!isJSONObject(json)) {
		return Either.left(
			new DecodeError({ entity: "diff", detail: "payload is not an object" }),
		);
	}
	const [first] = arrayField(json, "diffs").filter(isJSONObject);
	if (first === undefined) return Either.left(new NotFoundError({ path }));

	return guard("diff", () => {
		const comments = decodeComments(first);
		return {
			path: diffPath(first, path),
			hunks: arrayField(first, "hunks").map((hunk) =>
				decodeHunk(hunk, comments),
			),
		};
	}).pipe(
		Either.flatMap((model): Either.Either<DiffModel, DecodeError | NotFoundError> =>
			model.hunks.length === 0
				? Either.left(new NotFoundError({ path }))
				: Either.right(model),
		),
	);
}

function decodeChangedFile(raw: unknown): ChangedFile {
	const change = need(isJSONObject(raw) ? raw : null, "change");
	const path = need(objectField(change, "path"), "path");
	return {
		path: need(stringField(path, "toString"), "path.toString"),
		changeType: stringField(change, "type") ?? "UNKNOWN",
		executableBefore: change["srcExecutable"] === true,
		executableAfter: change["executable"] === true,
	};
}

/**
 * Decodes a page of `GET …/pull-requests/<id>/changes`.
 *
 * @pure true
 */
export function decodeChanges(
	json: unknown,
): Either.Either<readonly ChangedFile[], DecodeError> {
	return guard("changes", () =>
		arrayField(need(isJSONObject(json) ? json : null, "page"), "values").map(
			decodeChangedFile,
		),
	);
}

function decodePullRequest(raw: unknown): PullRequestSummary {
	const pr = need(isJSONObject(raw) ? raw : null, "pull request");
	const user = objectField(objectField(pr, "author") ?? EMPTY, "user") ?? EMPTY;
	const fromRef = objectField(pr, "fromRef") ?? EMPTY;
	return {
		id: need(numberField(pr, "id"), "id"),
		state: stringField(pr, "state") ?? "UNKNOWN",
		updatedAt: numberField(pr, "updatedDate") ?? 0,
		author:
			stringField(user, "displayName") ?? stringField(user, "name") ?? "?",
		sourceRef: stringField(fromRef, "id") ?? "",
		description: stringField(pr, "description") ?? "",
	};
}

/**
 * Decodes a page of `GET …/repos/<repo>/pull-requests`.
 *
 * @pure true
 */
export function decodePullRequests(
	json: unknown,
): Either.Either<readonly PullRequestSummary[], DecodeError> {
	return guard("pull-requests", () =>
		arrayField(need(isJSONObject(json) ? json : null, "page"), "values").map(
			decodePullRequest,
		),
	);
}

/**
 * First error message of a Stash error payload (`{ errors: [{ message }] }`).
 *
 * @pure true
 */
export function errorMessage(json: unknown): string | null {
	if (!isJSONObject(json)) return null;
	const [first] = arrayField(json, "errors").filter(isJSONObject);
	return first === undefined ? null : stringField(first, "message");
}
