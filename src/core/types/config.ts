// CHANGE: Command-line configuration types
// PURITY: CORE
// COMPLEXITY: O(1)

import type { PullRequestState } from "./stash.js";

/**
 * Sub-command selected on the command line.
 *
 * @property target Pull request (`review`, `ls`) or repository (`ls-reviews`) as typed by the user
 */
export type Command =
	| { readonly kind: "help" }
	| { readonly kind: "review"; readonly target: string; readonly file: string }
	| { readonly kind: "ls"; readonly target: string }
	| {
			readonly kind: "ls-reviews";
			readonly target: string;
			readonly state: PullRequestState;
			readonly descriptions: boolean;
	  };

/**
 * Verbosity requested with `--debug`.
 *
 * @invariant 0 = warnings, 1 = info, 2 = debug
 */
export type DebugLevel = 0 | 1 | 2;

/**
 * Options parsed from the rc file and argv.
 */
export interface CLIOptions {
	readonly command: Command;
	readonly user: string | null;
	readonly pass: string | null;
	readonly editor: string | null;
	readonly host: string | null;
	readonly project: string | null;
	readonly debug: DebugLevel;
}
