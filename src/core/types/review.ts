// CHANGE: Domain model for a single-file review: diff lines with attached comments
// PURITY: CORE
// INVARIANT: Line positions are fixed at creation; lines are never reordered
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Semantic type of a diff line.
 */
export type LineKind = "context" | "added" | "removed";

/**
 * Remote identity of an existing comment.
 *
 * @property id Opaque identifier assigned by the review service
 * @property version Optimistic-concurrency token required for update/delete
 *
 * @invariant Both are printable tokens without whitespace
 */
export interface Identity {
	readonly id: string;
	readonly version: string;
}

/**
 * Reviewer comment attached to a diff line.
 *
 * @invariant identity === null ⇔ comment was authored locally
 */
export interface Annotation {
	readonly text: string;
	readonly identity: Identity | null;
}

/**
 * One line of a hunk.
 *
 * @invariant kind = "context" ⇒ oldLine ≠ null ∧ newLine ≠ null
 * @invariant kind = "added" ⇒ oldLine = null
 * @invariant kind = "removed" ⇒ newLine = null
 */
export interface DiffLine {
	readonly kind: LineKind;
	readonly text: string;
	readonly oldLine: number | null;
	readonly newLine: number | null;
	readonly annotations: readonly Annotation[];
}

/**
 * Contiguous block of diff lines.
 *
 * @property section Trailing text of the `@@` header, empty when absent
 */
export interface Hunk {
	readonly oldStart: number;
	readonly oldCount: number;
	readonly newStart: number;
	readonly newCount: number;
	readonly section: string;
	readonly lines: readonly DiffLine[];
}

/**
 * Diff of one file together with its comments.
 */
export interface DiffModel {
	readonly path: string;
	readonly hunks: readonly Hunk[];
}

/**
 * Position of a diff line inside a model, used to anchor new comments.
 */
export interface LineAnchor {
	readonly hunk: number;
	readonly index: number;
	readonly kind: LineKind;
	readonly oldLine: number | null;
	readonly newLine: number | null;
}

/**
 * Change to replay against the review service.
 *
 * @invariant Update/Delete carry the version token fetched with the original model
 */
export type Mutation = Data.TaggedEnum<{
	Create: {
		readonly path: string;
		readonly anchor: LineAnchor;
		readonly text: string;
	};
	Update: { readonly identity: Identity; readonly text: string };
	Delete: { readonly identity: Identity };
}>;

export const Mutation = Data.taggedEnum<Mutation>();

/**
 * Non-fatal problem found while parsing an edited document.
 *
 * @property line 1-based line number in the document
 */
export interface ParseWarning {
	readonly line: number;
	readonly kind: "orphan-comment" | "orphan-continuation" | "hunk-size-mismatch";
	readonly detail: string;
}

/**
 * Result of parsing an edited document.
 */
export interface ParsedDocument {
	readonly model: DiffModel;
	readonly warnings: readonly ParseWarning[];
}

/**
 * Annotation together with the position it was found at.
 */
export interface LocatedAnnotation {
	readonly hunk: number;
	readonly index: number;
	readonly order: number;
	readonly line: DiffLine;
	readonly annotation: Annotation;
}

/**
 * Session-scoped settings shared by the renderer and the parser.
 *
 * @property path File under review, used when the document carries no file header
 * @property instructions Whether the renderer prepends the usage preamble
 */
export interface DocumentContext {
	readonly path: string;
	readonly instructions: boolean;
}
