// CHANGE: Run the user's editor on the review document and wait for it to exit
// PURITY: SHELL (spawns a process attached to the terminal)
// INVARIANT: Resolves exactly once, with the exit status or an EditorError
// COMPLEXITY: O(1); blocks until the editor exits, without timeout

import { Effect } from "effect";

import { EditorError } from "../../core/errors.js";
import type { EditorPort } from "../../core/types/ports.js";
import { spawn } from "../utils/node-mods.js";

/**
 * Splits an editor command such as `code --wait` into program and arguments.
 *
 * @pure true
 */
export function splitCommand(command: string): {
	readonly program: string;
	readonly args: readonly string[];
} {
	const [program = "", ...args] = command.trim().split(/\s+/u);
	return { program, args };
}

/**
 * Editor port backed by a child process sharing the terminal.
 */
export function makeEditor(command: string): EditorPort {
	const { program, args } = splitCommand(command);
	return {
		command,
		runEditor: (filePath) =>
			Effect.async<number, EditorError>((resume) => {
				let settled = false;
				const settle = (result: Effect.Effect<number, EditorError>): void => {
					if (settled) return;
					settled = true;
					resume(result);
				};
				const child = spawn(program, [...args, filePath], { stdio: "inherit" });
				child.once("error", (error) => {
					settle(Effect.fail(new EditorError({ command, detail: error.message })));
				});
				child.once("exit", (code, signal) => {
					settle(
						code === null
							? Effect.fail(
									new EditorError({
										command,
										detail: `terminated by ${signal ?? "signal"}`,
									}),
								)
							: Effect.succeed(code),
					);
				});
			}),
	};
}
