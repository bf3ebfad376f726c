// CHANGE: Change-set differ between the fetched and the edited review
// FORMAT THEOREM: ∀m ∈ DiffModel: diffReviews(m, parse(render(m))) = []
// PURITY: CORE
// INVARIANT: Creates/Updates follow edited document order, Deletes follow original document order
// INVARIANT: Update and Delete always carry the version token of the original model
// INVARIANT: Texts equal up to line-ending carriage returns are unchanged
// COMPLEXITY: O(n + m) where n, m = annotations in original and edited

import { documentText } from "../document/grammar.js";
import { type DiffModel, type Identity, Mutation } from "../types/review.js";
import { anchorOf, annotationsOf } from "./annotations.js";

interface RemoteComment {
	readonly identity: Identity;
	readonly text: string;
}

function indexRemoteComments(
	model: DiffModel,
): ReadonlyMap<string, RemoteComment> {
	const index = new Map<string, RemoteComment>();
	for (const { annotation } of annotationsOf(model)) {
		const { identity } = annotation;
		if (identity !== null && !index.has(identity.id)) {
			index.set(identity.id, { identity, text: annotation.text });
		}
	}
	return index;
}

/**
 * Computes the ordered mutations that turn `original` into `edited`.
 *
 * @param original Model fetched from the review service
 * @param edited Model parsed from the edited document
 * @returns Mutations to apply, in application order
 *
 * @pure true
 * @invariant Deterministic: equal inputs give equal outputs
 * @postcondition An annotation keeping its identity and text yields no mutation
 *
 * @example
 * ```ts
 * diffReviews(original, edited);
 * // [Mutation.Create({ path, anchor, text: "typo" }), Mutation.Delete({ identity })]
 * ```
 */
export function diffReviews(
	original: DiffModel,
	edited: DiffModel,
): readonly Mutation[] {
	const remote = indexRemoteComments(original);
	const claimed = new Set<string>();
	const changes: Mutation[] = [];

	for (const located of annotationsOf(edited)) {
		const { identity, text } = located.annotation;
		const match =
			identity === null || claimed.has(identity.id)
				? undefined
				: remote.get(identity.id);

		if (match === undefined) {
			changes.push(
				Mutation.Create({ path: original.path, anchor: anchorOf(located), text }),
			);
			continue;
		}

		claimed.add(match.identity.id);
		if (documentText(match.text) !== documentText(text)) {
			changes.push(Mutation.Update({ identity: match.identity, text }));
		}
	}

	for (const { identity } of remote.values()) {
		if (!claimed.has(identity.id)) {
			changes.push(Mutation.Delete({ identity }));
		}
	}

	return changes;
}
