// CHANGE: Human-readable descriptions of mutations and apply reports
// PURITY: CORE
// INVARIANT: Output depends only on the arguments
// COMPLEXITY: O(n) where n = mutations in the report

import { match } from "ts-pattern";

import type { ApplyReport } from "../models.js";
import type { LineAnchor, Mutation } from "../types/review.js";

/**
 * Line label as shown to the user: removed lines use the old file numbering.
 *
 * @pure true
 * @example
 * ```ts
 * lineLabel({ hunk: 0, index: 2, kind: "removed", oldLine: 14, newLine: null });
 * // "old line 14"
 * ```
 */
export function lineLabel(anchor: LineAnchor): string {
	return anchor.kind === "removed"
		? `old line ${anchor.oldLine ?? "?"}`
		: `line ${anchor.newLine ?? "?"}`;
}

/**
 * One-line description of a mutation.
 *
 * @pure true
 */
export function describeMutation(mutation: Mutation): string {
	return match(mutation)
		.with(
			{ _tag: "Create" },
			({ path, anchor }) => `add comment at ${path} ${lineLabel(anchor)}`,
		)
		.with(
			{ _tag: "Update" },
			({ identity }) => `modify comment ${identity.id} (version ${identity.version})`,
		)
		.with(
			{ _tag: "Delete" },
			({ identity }) => `delete comment ${identity.id} (version ${identity.version})`,
		)
		.exhaustive();
}

/**
 * Summary printed at the end of a session.
 *
 * @pure true
 * @postcondition First line always reports applied/total counts
 */
export function summarizeApply(report: ApplyReport): readonly string[] {
	const lines = [`${report.applied.length}/${report.total} changes applied`];

	if (report.conflicts.length > 0) {
		lines.push(
			`${report.conflicts.length} changes were rejected because the comment changed remotely:`,
			...report.conflicts.map(
				(conflict) => `  - ${describeMutation(conflict.mutation)}`,
			),
		);
	}

	if (report.halted !== null) {
		const { mutation, error, remaining } = report.halted;
		lines.push(
			`stopped at: ${describeMutation(mutation)}: ${error.detail}`,
			`${remaining} changes were not attempted`,
		);
	}

	return lines;
}
