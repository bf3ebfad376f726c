// CHANGE: Make main.ts a thin APP delegator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { consolePrinter } from "./app/runReview.js";
import { type CliIO, runCli } from "./app/runCli.js";
import type { ExitCode } from "./core/models.js";
import { makeEditor } from "./shell/editor/editor.js";
import { makeReviewFiles } from "./shell/files/temp.js";

/**
 * Collaborators of a real process: environment, global fetch, stdout, temp dir.
 */
export function processIO(): CliIO {
	return {
		env: process.env,
		fetch: (url, init) => fetch(url, init),
		print: consolePrinter,
		makeEditor,
		files: makeReviewFiles(),
	};
}

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(runCli(argv, processIO()));
}
