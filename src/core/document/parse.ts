// CHANGE: Rebuild a diff model from an edited review document
// PURITY: CORE
// INVARIANT: Total over any input text; malformed fragments degrade to warnings
// INVARIANT: hunks = 0 ⇒ Left(MalformedDocument)
// COMPLEXITY: O(n) where n = number of document lines

import { Either } from "effect";

import { MalformedDocument } from "../errors.js";
import type {
	Annotation,
	DiffLine,
	DocumentContext,
	Hunk,
	Identity,
	LineKind,
	ParsedDocument,
	ParseWarning,
} from "../types/review.js";
import { classifyLine, formatHunkHeader, type HunkHeader } from "./grammar.js";

interface AnnotationDraft {
	text: string;
	readonly identity: Identity | null;
}

interface LineDraft {
	readonly kind: LineKind;
	readonly text: string;
	readonly annotations: AnnotationDraft[];
}

interface HunkDraft {
	readonly header: HunkHeader;
	readonly headerLine: number;
	readonly lines: LineDraft[];
	/** Positions in `lines` at which a blank document line was read. */
	readonly blanks: number[];
	oldSeen: number;
	newSeen: number;
}

interface ParserState {
	readonly hunks: HunkDraft[];
	readonly warnings: ParseWarning[];
	oldPath: string | null;
	newPath: string | null;
}

function currentHunk(state: ParserState): HunkDraft | undefined {
	return state.hunks.at(-1);
}

function currentLine(state: ParserState): LineDraft | undefined {
	return currentHunk(state)?.lines.at(-1);
}

function pushDiffLine(hunk: HunkDraft, kind: LineKind, text: string): void {
	if (kind !== "added") hunk.oldSeen += 1;
	if (kind !== "removed") hunk.newSeen += 1;
	hunk.lines.push({ kind, text, annotations: [] });
}

/**
 * Restores empty context lines whose single space an editor stripped.
 *
 * @invariant Only a hunk short on both sides is filled, with at most one line per blank
 * @invariant Restored lines carry no annotations
 */
function restoreBlankContext(hunk: HunkDraft): void {
	const missing = Math.min(
		hunk.header.oldCount - hunk.oldSeen,
		hunk.header.newCount - hunk.newSeen,
	);
	const restored = hunk.blanks.slice(0, Math.max(missing, 0));
	for (const position of [...restored].reverse()) {
		hunk.lines.splice(position, 0, { kind: "context", text: "", annotations: [] });
	}
	hunk.oldSeen += restored.length;
	hunk.newSeen += restored.length;
}

function closeHunk(state: ParserState): void {
	const hunk = currentHunk(state);
	if (hunk === undefined) return;
	restoreBlankContext(hunk);
	const { header } = hunk;
	if (hunk.oldSeen === header.oldCount && hunk.newSeen === header.newCount) {
		return;
	}
	state.warnings.push({
		line: hunk.headerLine,
		kind: "hunk-size-mismatch",
		detail: `${formatHunkHeader(header)} declares ${header.oldCount}/${header.newCount} old/new lines, found ${hunk.oldSeen}/${hunk.newSeen}`,
	});
}

function attachComment(
	state: ParserState,
	lineNumber: number,
	annotation: AnnotationDraft,
): void {
	const line = currentLine(state);
	if (line === undefined) {
		state.warnings.push({
			line: lineNumber,
			kind: "orphan-comment",
			detail: "comment is not preceded by a diff line and was skipped",
		});
		return;
	}
	line.annotations.push(annotation);
}

function continueComment(
	state: ParserState,
	lineNumber: number,
	text: string,
): void {
	const annotation = currentLine(state)?.annotations.at(-1);
	if (annotation === undefined) {
		state.warnings.push({
			line: lineNumber,
			kind: "orphan-continuation",
			detail: "continuation line has no comment to extend and was skipped",
		});
		return;
	}
	annotation.text = `${annotation.text}\n${text}`;
}

function consumeLine(state: ParserState, raw: string, lineNumber: number): void {
	const hunk = currentHunk(state);
	const line = classifyLine(raw, hunk !== undefined);

	switch (line.type) {
		case "hunk":
			closeHunk(state);
			state.hunks.push({
				header: line.header,
				headerLine: lineNumber,
				lines: [],
				blanks: [],
				oldSeen: 0,
				newSeen: 0,
			});
			return;
		case "diff":
			if (hunk !== undefined) pushDiffLine(hunk, line.kind, line.text);
			return;
		case "blank":
			if (hunk !== undefined) hunk.blanks.push(hunk.lines.length);
			return;
		case "comment":
			attachComment(state, lineNumber, {
				text: line.text,
				identity: line.identity,
			});
			return;
		case "continuation":
			continueComment(state, lineNumber, line.text);
			return;
		case "old-file":
			state.oldPath = line.path;
			return;
		case "new-file":
			state.newPath = line.path;
			return;
		case "instruction":
		case "other":
			return;
	}
}

function freezeLine(
	line: LineDraft,
	oldLine: number | null,
	newLine: number | null,
): DiffLine {
	const annotations: readonly Annotation[] = line.annotations.map(
		(annotation) => ({ text: annotation.text, identity: annotation.identity }),
	);
	return { kind: line.kind, text: line.text, oldLine, newLine, annotations };
}

function freezeHunk(hunk: HunkDraft): Hunk {
	let oldLine = hunk.header.oldStart;
	let newLine = hunk.header.newStart;
	const lines = hunk.lines.map((line) => {
		const frozen = freezeLine(
			line,
			line.kind === "added" ? null : oldLine,
			line.kind === "removed" ? null : newLine,
		);
		if (frozen.oldLine !== null) oldLine += 1;
		if (frozen.newLine !== null) newLine += 1;
		return frozen;
	});
	return { ...hunk.header, lines };
}

/**
 * Parses an edited review document back into a diff model.
 *
 * @param text Document text as written by the editor
 * @param context Session settings; `path` is used when the document has no file header
 * @returns Model with recorded warnings, or MalformedDocument when no hunk is left
 *
 * @pure true
 * @invariant Line numbers come from hunk headers and line markers only
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const parsed = parseDocument("@@ -1,1 +1,1 @@\n ctx\n# nice\n", context);
 * // Right({ model: { path, hunks: [ ...one context line with "nice" ] }, warnings: [] })
 * ```
 */
export function parseDocument(
	text: string,
	context: DocumentContext,
): Either.Either<ParsedDocument, MalformedDocument> {
	const state: ParserState = {
		hunks: [],
		warnings: [],
		oldPath: null,
		newPath: null,
	};

	const lines = text.split(/\r?\n/u);
	if (lines.at(-1) === "") lines.pop();
	lines.forEach((raw, index) => {
		consumeLine(state, raw, index + 1);
	});
	closeHunk(state);

	if (state.hunks.length === 0) {
		return Either.left(
			new MalformedDocument({
				detail: "document contains no hunks; was the diff removed?",
			}),
		);
	}

	return Either.right({
		model: {
			path: state.newPath ?? state.oldPath ?? context.path,
			hunks: state.hunks.map(freezeHunk),
		},
		warnings: state.warnings,
	});
}
