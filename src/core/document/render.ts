// CHANGE: Serialize a diff model into the editable review document
// PURITY: CORE
// INVARIANT: parseDocument(renderDocument(m)).model = m for texts without marker sequences
// COMPLEXITY: O(n) where n = lines + annotations

import type { DiffLine, DiffModel, DocumentContext } from "../types/review.js";
import {
	formatComment,
	formatDiffLine,
	formatFileHeaders,
	formatHunkHeader,
	formatInstruction,
} from "./grammar.js";

/**
 * Usage hint placed above the diff when the context asks for it.
 *
 * @pure true
 */
export function instructionLines(path: string): readonly string[] {
	return [
		`Review of ${path}`,
		"",
		"Comment on a line by adding a line starting with '# ' right below it.",
		"Continue a multi-line comment with lines starting with '#| '.",
		"Edit or delete existing comments ('# [id@version] ...') to update or remove them.",
		"Lines starting with '##' are ignored. Save and quit to apply.",
		"",
		"vim: ft=diff",
	].map(formatInstruction);
}

function renderLine(line: DiffLine): readonly string[] {
	return [
		formatDiffLine(line.kind, line.text),
		...line.annotations.flatMap((annotation) =>
			formatComment(annotation.identity, annotation.text),
		),
	];
}

/**
 * Renders a diff model as plain text.
 *
 * @param model Diff with annotations
 * @param context Session settings
 * @returns Document text terminated by a newline
 *
 * @pure true
 * @example
 * ```ts
 * renderDocument(model, { path: "src/a.ts", instructions: false });
 * // "--- a/src/a.ts\n+++ b/src/a.ts\n@@ -1,1 +1,1 @@\n ctx\n# [3@0] why?\n"
 * ```
 */
export function renderDocument(
	model: DiffModel,
	context: DocumentContext,
): string {
	const preamble = context.instructions ? instructionLines(model.path) : [];
	const body = model.hunks.flatMap((hunk) => [
		formatHunkHeader(hunk),
		...hunk.lines.flatMap(renderLine),
	]);
	return `${[...preamble, ...formatFileHeaders(model.path), ...body].join("\n")}\n`;
}
