// CHANGE: Document-order traversal of annotations with their positions
// PURITY: CORE
// INVARIANT: Order = hunk order, then line order, then intra-line order
// COMPLEXITY: O(n) where n = lines + annotations

import type {
	DiffModel,
	LineAnchor,
	LocatedAnnotation,
} from "../types/review.js";

/**
 * Lists every annotation of a model in document order.
 *
 * @pure true
 */
export function annotationsOf(model: DiffModel): readonly LocatedAnnotation[] {
	return model.hunks.flatMap((hunk, hunkIndex) =>
		hunk.lines.flatMap((line, index) =>
			line.annotations.map((annotation, order) => ({
				hunk: hunkIndex,
				index,
				order,
				line,
				annotation,
			})),
		),
	);
}

/**
 * Anchor of the line a located annotation is attached to.
 *
 * @pure true
 */
export function anchorOf(located: LocatedAnnotation): LineAnchor {
	return {
		hunk: located.hunk,
		index: located.index,
		kind: located.line.kind,
		oldLine: located.line.oldLine,
		newLine: located.line.newLine,
	};
}

/**
 * Total number of annotations in a model.
 *
 * @pure true
 */
export function countAnnotations(model: DiffModel): number {
	return model.hunks.reduce(
		(total, hunk) =>
			total +
			hunk.lines.reduce((sum, line) => sum + line.annotations.length, 0),
		0,
	);
}
