// CHANGE: Read default arguments from the rc file
// PURITY: SHELL (filesystem, environment)
// INVARIANT: A missing or unreadable rc file yields no arguments, never an error
// COMPLEXITY: O(n) where n = rc file size

import { Effect } from "effect";

import { fs, os, path } from "../utils/node-mods.js";

/**
 * Location of the rc file: `$DIFFNOTE_RC`, else `~/.config/diffnote/diffnoterc`.
 */
export function rcPath(env: NodeJS.ProcessEnv): string {
	return (
		env["DIFFNOTE_RC"] ??
		path.join(os.homedir(), ".config", "diffnote", "diffnoterc")
	);
}

/**
 * Arguments of an rc file: one per non-blank line, trimmed.
 *
 * @pure true
 * @example
 * ```ts
 * parseRcFile("--host=stash.local\n\n  --user=jane\n");
 * // ["--host=stash.local", "--user=jane"]
 * ```
 */
export function parseRcFile(content: string): readonly string[] {
	return content
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

function isMissing(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Loads rc-file arguments. A missing file is normal; other failures are
 * logged as warnings.
 */
export function loadRcArgs(file: string): Effect.Effect<readonly string[]> {
	return Effect.try({
		try: () => parseRcFile(fs.readFileSync(file, "utf8")),
		catch: (error) => error,
	}).pipe(
		Effect.tap(() => Effect.logInfo(`arguments read from ${file}`)),
		Effect.catchAll((error) =>
			(isMissing(error)
				? Effect.logDebug(`no config at ${file}`)
				: Effect.logWarning(
						`cannot access config ${file}: ${error instanceof Error ? error.message : String(error)}`,
					)
			).pipe(Effect.as<readonly string[]>([])),
		),
	);
}
