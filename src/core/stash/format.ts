// CHANGE: Text layout of the `ls` and `ls-reviews` listings
// PURITY: CORE
// COMPLEXITY: O(n) where n = length of the formatted fields

import type { ChangedFile, PullRequestSummary } from "../types/stash.js";

/**
 * Executable-bit marker: `+x` when the file became executable, `-x` when it
 * stopped being one.
 *
 * @pure true
 */
export function executableFlag(file: ChangedFile): string {
	if (file.executableBefore === file.executableAfter) return "";
	return file.executableAfter ? "+x" : "-x";
}

/**
 * @pure true
 * @example
 * ```ts
 * formatChangedFile({ path: "run.sh", changeType: "MODIFY", executableBefore: false, executableAfter: true });
 * // "+x  MODIFY run.sh"
 * ```
 */
export function formatChangedFile(file: ChangedFile): string {
	return `${executableFlag(file).padStart(2)} ${file.changeType.padStart(7)} ${file.path}`;
}

/**
 * Short branch name: the last segment of the ref.
 *
 * @pure true
 */
export function branchName(ref: string): string {
	return /([^/]+)$/u.exec(ref)?.[1] ?? ref;
}

function formatDate(epochMillis: number): string {
	return new Date(epochMillis).toISOString().slice(0, 10);
}

/**
 * Lines describing one pull request, optionally followed by its indented description.
 *
 * @pure true
 * @invariant Description lines are indented past the id column
 */
export function formatPullRequest(
	pr: PullRequestSummary,
	withDescription: boolean,
): readonly string[] {
	const id = String(pr.id).padStart(3);
	const header = `${id} ${pr.state} [${formatDate(pr.updatedAt)}] ${pr.author.padStart(25)} ${branchName(pr.sourceRef)}`;
	if (!withDescription || pr.description.length === 0) return [header];

	const indent = " ".repeat(id.length + 1);
	return [
		header,
		...["---", ...pr.description.split("\n"), "---"].map(
			(line) => `${indent}${line}`,
		),
	];
}
