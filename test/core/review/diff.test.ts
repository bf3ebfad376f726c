// CHANGE: Deterministic and property-based specs for the change-set differ
// FORMAT THEOREM: ∀m ∈ DiffModel: diffReviews(m, m) = []
// PURITY: CORE
// INVARIANT: Creates/Updates follow the edited document, Deletes the original one
// COMPLEXITY: O(n) per assertion

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { parseDocument } from "../../../src/core/document/parse.js";
import { renderDocument } from "../../../src/core/document/render.js";
import { diffReviews } from "../../../src/core/review/diff.js";
import {
	type Annotation,
	type DiffLine,
	type DiffModel,
	Mutation,
} from "../../../src/core/types/index.js";
import {
	added,
	anchor,
	context,
	hunk,
	identity,
	model,
	note,
	removed,
	sampleModel,
} from "../../utils/builders.js";

const lineA = context("a", 1, 1);
const lineB = removed("b", 2);
const lineC = added("c", 2);

function withComments(
	a: DiffLine["annotations"],
	b: DiffLine["annotations"] = [],
	c: DiffLine["annotations"] = [],
): DiffModel {
	return model("src/x.ts", [
		hunk(1, 1, [
			{ ...lineA, annotations: a },
			{ ...lineB, annotations: b },
			{ ...lineC, annotations: c },
		]),
	]);
}

describe("diffReviews", () => {
	it("returns no mutations for an unchanged review", () => {
		expect(diffReviews(sampleModel(), sampleModel())).toEqual([]);
	});

	it("creates a comment for an annotation without identity", () => {
		const original = withComments([]);
		const edited = withComments([], [note("typo")]);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 1, lineB),
				text: "typo",
			}),
		]);
	});

	it("updates a comment whose text changed, with the original version", () => {
		const original = withComments([note("old", identity("5", "3"))]);
		const edited = withComments([note("new", identity("5", "3"))]);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Update({ identity: identity("5", "3"), text: "new" }),
		]);
	});

	it("uses the original version even when the tag was edited", () => {
		const original = withComments([note("old", identity("5", "3"))]);
		const edited = withComments([note("new", identity("5", "99"))]);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Update({ identity: identity("5", "3"), text: "new" }),
		]);
	});

	it("deletes a comment that disappeared", () => {
		const original = withComments([note("bye", identity("5", "3"))]);

		expect(diffReviews(original, withComments([]))).toEqual([
			Mutation.Delete({ identity: identity("5", "3") }),
		]);
	});

	it("treats an unknown identity as a new comment", () => {
		const original = withComments([]);
		const edited = withComments([note("hi", identity("404", "0"))]);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 0, lineA),
				text: "hi",
			}),
		]);
	});

	it("lets only the first copy of a duplicated identity claim the comment", () => {
		const original = withComments([note("same", identity("5", "3"))]);
		const edited = withComments(
			[note("same", identity("5", "3"))],
			[],
			[note("copy", identity("5", "3"))],
		);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 2, lineC),
				text: "copy",
			}),
		]);
	});

	it("matches a moved comment by identity without recreating it", () => {
		const original = withComments([note("keep", identity("5", "3"))]);
		const edited = withComments([], [], [note("keep", identity("5", "3"))]);

		expect(diffReviews(original, edited)).toEqual([]);
	});

	it("orders creates and updates by edited document, then deletes by original document", () => {
		const original = withComments(
			[note("one", identity("1", "0")), note("two", identity("2", "0"))],
			[note("three", identity("3", "0"))],
		);
		const edited = withComments(
			[note("fresh")],
			[note("THREE", identity("3", "0"))],
			[note("one", identity("1", "0")), note("last")],
		);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 0, lineA),
				text: "fresh",
			}),
			Mutation.Update({ identity: identity("3", "0"), text: "THREE" }),
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 2, lineC),
				text: "last",
			}),
			Mutation.Delete({ identity: identity("2", "0") }),
		]);
	});

	it("keeps an unchanged comment, deletes a removed one and creates a new one", () => {
		const original = withComments(
			[note("fix this", identity("1", "0"))],
			[note("nit", identity("2", "0"))],
		);
		const edited = withComments(
			[note("fix this", identity("1", "0"))],
			[],
			[note("new text")],
		);

		expect(diffReviews(original, edited)).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 2, lineC),
				text: "new text",
			}),
			Mutation.Delete({ identity: identity("2", "0") }),
		]);
	});

	it("creates even an empty comment", () => {
		expect(diffReviews(withComments([]), withComments([note("")]))).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 0, lineA),
				text: "",
			}),
		]);
	});

	it("ignores carriage returns ending the lines of a remote comment", () => {
		const original = withComments([note("line one\r\nline two\r", identity("5", "1"))]);

		expect(
			diffReviews(original, withComments([note("line one\nline two", identity("5", "1"))])),
		).toEqual([]);
		expect(
			diffReviews(original, withComments([note("line one\nline 2", identity("5", "1"))])),
		).toEqual([
			Mutation.Update({ identity: identity("5", "1"), text: "line one\nline 2" }),
		]);
	});

	it("anchors a comment typed after a blank line to the line above", () => {
		const original = model("src/x.ts", [
			hunk(1, 1, [context("a", 1, 1), context("b", 2, 2), context("c", 3, 3)]),
		]);
		const edited = parseDocument("@@ -1,3 +1,3 @@\n a\n\n# about a\n b\n c\n", {
			path: "src/x.ts",
			instructions: false,
		});
		expect(Either.isRight(edited)).toBe(true);
		if (Either.isLeft(edited)) return;

		expect(edited.right.warnings).toEqual([]);
		expect(diffReviews(original, edited.right.model)).toEqual([
			Mutation.Create({
				path: "src/x.ts",
				anchor: anchor(0, 0, context("a", 1, 1)),
				text: "about a",
			}),
		]);
	});

	it("deletes the comment of a diff line removed from the document", () => {
		const original = sampleModel();
		const text = renderDocument(original, {
			path: original.path,
			instructions: false,
		}).replace(" const a = 1;\n# [7@1] why one?\n", "");

		const edited = parseDocument(text, { path: original.path, instructions: false });
		expect(Either.isRight(edited)).toBe(true);
		if (Either.isLeft(edited)) return;

		expect(edited.right.warnings).toEqual([
			{
				line: 3,
				kind: "hunk-size-mismatch",
				detail: "@@ -10,2 +10,2 @@ function setup() declares 2/2 old/new lines, found 1/1",
			},
		]);
		expect(diffReviews(original, edited.right.model)).toEqual([
			Mutation.Delete({ identity: identity("7", "1") }),
		]);
	});

	it("diffs a rendered, edited and re-parsed document", () => {
		const original = sampleModel();
		const text = renderDocument(original, {
			path: original.path,
			instructions: true,
		})
			.replace("# [7@1] why one?\n", "")
			.replace("+const b = 3;\n", "+const b = 3;\n# prefer a constant\n")
			.replace("#| please\n", "#| please, and export default\n");

		const edited = parseDocument(text, {
			path: original.path,
			instructions: true,
		});
		expect(Either.isRight(edited)).toBe(true);
		if (Either.isLeft(edited)) return;

		expect(diffReviews(original, edited.right.model)).toEqual([
			Mutation.Create({
				path: "src/app.ts",
				anchor: {
					hunk: 0,
					index: 2,
					kind: "added",
					oldLine: null,
					newLine: 11,
				},
				text: "prefer a constant",
			}),
			Mutation.Update({
				identity: identity("9", "4"),
				text: "rename\nplease, and export default",
			}),
			Mutation.Delete({ identity: identity("7", "1") }),
		]);
	});
});

const identities = fc.uniqueArray(fc.integer({ min: 1, max: 50 }), {
	maxLength: 6,
});

const reviewed: fc.Arbitrary<DiffModel> = identities.chain((ids) =>
	fc
		.array(fc.constantFrom(0, 1, 2), {
			minLength: ids.length,
			maxLength: ids.length,
		})
		.map((targets) => {
			const buckets: Annotation[][] = [[], [], []];
			ids.forEach((id, index) => {
				buckets[targets[index] ?? 0]?.push(
					note(`text ${id}`, identity(String(id), "1")),
				);
			});
			return withComments(buckets[0] ?? [], buckets[1] ?? [], buckets[2] ?? []);
		}),
);

describe("diffReviews (properties)", () => {
	it("is empty when nothing changed", () => {
		fc.assert(
			fc.property(reviewed, (review) => {
				expect(diffReviews(review, review)).toEqual([]);
			}),
		);
	});

	it("deletes every remote comment when all annotations are removed", () => {
		fc.assert(
			fc.property(reviewed, (review) => {
				const mutations = diffReviews(review, withComments([]));
				expect(mutations.every((m) => m._tag === "Delete")).toBe(true);
				expect(mutations).toHaveLength(
					review.hunks[0]?.lines.reduce((n, l) => n + l.annotations.length, 0) ?? 0,
				);
			}),
		);
	});

	it("never emits a delete before a create or update", () => {
		fc.assert(
			fc.property(reviewed, reviewed, (original, edited) => {
				const tags = diffReviews(original, edited).map((m) => m._tag);
				const firstDelete = tags.indexOf("Delete");
				if (firstDelete >= 0) {
					expect(tags.slice(firstDelete).every((tag) => tag === "Delete")).toBe(
						true,
					);
				}
			}),
		);
	});
});
