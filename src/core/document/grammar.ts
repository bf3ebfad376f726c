// CHANGE: Single definition of the editable review document format
// PURITY: CORE
// INVARIANT: ∀ form ∈ LineForm: classify(format(form)) = form (for texts without marker sequences)
// COMPLEXITY: O(n) per line where n = line length

import type { Hunk, Identity, LineKind } from "../types/review.js";

export const INSTRUCTION_MARKER = "##";
export const COMMENT_MARKER = "#";
export const CONTINUATION_MARKER = "#|";
export const OLD_FILE_MARKER = "--- a/";
export const NEW_FILE_MARKER = "+++ b/";

const LINE_MARKERS: Readonly<Record<LineKind, string>> = {
	context: " ",
	added: "+",
	removed: "-",
};

const LINE_KINDS: readonly LineKind[] = ["context", "added", "removed"];

const HUNK_HEADER_PATTERN =
	/^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(?: (.*))?$/u;

const IDENTITY_TAG_PATTERN = /^\[([^\s@\]]+)@([^\s\]]+)\](?: |$)/u;

/**
 * Header fields of a hunk, without its lines.
 */
export type HunkHeader = Omit<Hunk, "lines">;

/**
 * Classified document line.
 *
 * @remarks
 * `blank` and `other` carry no payload; the parser decides what they mean
 * from its state.
 */
export type DocumentLine =
	| { readonly type: "instruction" }
	| { readonly type: "old-file"; readonly path: string }
	| { readonly type: "new-file"; readonly path: string }
	| { readonly type: "hunk"; readonly header: HunkHeader }
	| { readonly type: "diff"; readonly kind: LineKind; readonly text: string }
	| {
			readonly type: "comment";
			readonly identity: Identity | null;
			readonly text: string;
	  }
	| { readonly type: "continuation"; readonly text: string }
	| { readonly type: "blank" }
	| { readonly type: "other" };

function dropOneSpace(value: string): string {
	return value.startsWith(" ") ? value.slice(1) : value;
}

function parseCount(value: string | undefined): number {
	return value === undefined ? 1 : Number.parseInt(value, 10);
}

/**
 * Parses a `@@ -a,b +c,d @@ section` header.
 *
 * @returns Header fields or null when the line is not a hunk header
 * @pure true
 */
export function parseHunkHeader(line: string): HunkHeader | null {
	const match = HUNK_HEADER_PATTERN.exec(line);
	if (match === null) return null;
	return {
		oldStart: Number.parseInt(match[1] ?? "0", 10),
		oldCount: parseCount(match[2]),
		newStart: Number.parseInt(match[3] ?? "0", 10),
		newCount: parseCount(match[4]),
		section: match[5] ?? "",
	};
}

/**
 * Splits a comment body into its identity tag and free text.
 *
 * @pure true
 * @example
 * ```ts
 * parseCommentBody("[12@3] looks good");
 * // { identity: { id: "12", version: "3" }, text: "looks good" }
 * ```
 */
export function parseCommentBody(body: string): {
	readonly identity: Identity | null;
	readonly text: string;
} {
	const match = IDENTITY_TAG_PATTERN.exec(body);
	if (match === null) return { identity: null, text: body };
	return {
		identity: { id: match[1] ?? "", version: match[2] ?? "" },
		text: body.slice(match[0].length),
	};
}

function classifyComment(line: string): DocumentLine {
	if (line.startsWith(INSTRUCTION_MARKER)) return { type: "instruction" };
	if (line.startsWith(CONTINUATION_MARKER)) {
		return {
			type: "continuation",
			text: dropOneSpace(line.slice(CONTINUATION_MARKER.length)),
		};
	}
	const body = dropOneSpace(line.slice(COMMENT_MARKER.length));
	return { type: "comment", ...parseCommentBody(body) };
}

function classifyDiffLine(line: string): DocumentLine {
	for (const kind of LINE_KINDS) {
		const marker = LINE_MARKERS[kind];
		if (line.startsWith(marker)) {
			return { type: "diff", kind, text: line.slice(marker.length) };
		}
	}
	return { type: "other" };
}

/**
 * Classifies one document line.
 *
 * @param line Line without its terminator
 * @param inHunk Whether a hunk header has been seen; file headers are only
 *   recognised before the first hunk
 * @pure true
 */
export function classifyLine(line: string, inHunk: boolean): DocumentLine {
	if (line.length === 0) return { type: "blank" };
	if (line.startsWith(COMMENT_MARKER)) return classifyComment(line);

	const header = parseHunkHeader(line);
	if (header !== null) return { type: "hunk", header };

	if (!inHunk) {
		if (line.startsWith(OLD_FILE_MARKER)) {
			return { type: "old-file", path: line.slice(OLD_FILE_MARKER.length) };
		}
		if (line.startsWith(NEW_FILE_MARKER)) {
			return { type: "new-file", path: line.slice(NEW_FILE_MARKER.length) };
		}
		return { type: "other" };
	}

	return classifyDiffLine(line);
}

export function formatInstruction(text: string): string {
	return text.length === 0
		? INSTRUCTION_MARKER
		: `${INSTRUCTION_MARKER} ${text}`;
}

export function formatFileHeaders(path: string): readonly string[] {
	return [`${OLD_FILE_MARKER}${path}`, `${NEW_FILE_MARKER}${path}`];
}

export function formatHunkHeader(header: HunkHeader): string {
	const base = `@@ -${header.oldStart},${header.oldCount} +${header.newStart},${header.newCount} @@`;
	return header.section.length === 0 ? base : `${base} ${header.section}`;
}

export function formatDiffLine(kind: LineKind, text: string): string {
	return `${LINE_MARKERS[kind]}${text}`;
}

function withBody(marker: string, body: string): string {
	return body.length === 0 ? marker : `${marker} ${body}`;
}

/**
 * Comment text as it reads back from a document: a carriage return that
 * ends a line is dropped with the line break.
 *
 * @pure true
 * @example
 * ```ts
 * documentText("one\r\ntwo\r");
 * // "one\ntwo"
 * ```
 */
export function documentText(text: string): string {
	return text.replace(/\r(?=\n|$)/gu, "");
}

/**
 * Formats an annotation as one comment line plus one continuation line per
 * additional line of text.
 *
 * @pure true
 * @example
 * ```ts
 * formatComment({ id: "7", version: "0" }, "first\nsecond");
 * // ["# [7@0] first", "#| second"]
 * ```
 */
export function formatComment(
	identity: Identity | null,
	text: string,
): readonly string[] {
	const [first = "", ...rest] = text.split("\n");
	const tag = identity === null ? "" : `[${identity.id}@${identity.version}]`;
	const head = tag.length === 0 ? first : withBody(tag, first);
	return [
		withBody(COMMENT_MARKER, head),
		...rest.map((segment) => withBody(CONTINUATION_MARKER, segment)),
	];
}
