// CHANGE: Pure command-line parsing over an explicit argument list
// PURITY: CORE
// INVARIANT: Later occurrences of a flag override earlier ones (rc file first, argv last)
// COMPLEXITY: O(n) where n = number of arguments

import { Either } from "effect";

import { UsageError } from "../errors.js";
import type { CLIOptions, Command, DebugLevel } from "../types/config.js";
import type { PullRequestState } from "../types/stash.js";

type ValueKey = "user" | "pass" | "editor" | "debug" | "host" | "project";

const VALUE_FLAGS: Readonly<Record<string, ValueKey | undefined>> = {
	"-u": "user",
	"--user": "user",
	"-p": "pass",
	"--pass": "pass",
	"-e": "editor",
	"--editor": "editor",
	"--debug": "debug",
	"--host": "host",
	"--project": "project",
};

const STATES: readonly PullRequestState[] = ["open", "merged", "declined"];

interface ArgState {
	readonly values: Partial<Record<ValueKey, string>>;
	readonly positionals: readonly string[];
	readonly descriptions: boolean;
	readonly help: boolean;
}

interface ArgProcessResult {
	readonly state: ArgState;
	readonly skipNext: boolean;
}

function splitInline(arg: string): {
	readonly name: string;
	readonly inline: string | undefined;
} {
	const eq = arg.indexOf("=");
	if (!arg.startsWith("-") || eq < 0) return { name: arg, inline: undefined };
	return { name: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

function processArgument(
	arg: string,
	next: string | undefined,
	current: ArgState,
): Either.Either<ArgProcessResult, UsageError> {
	const { name, inline } = splitInline(arg);
	const key = VALUE_FLAGS[name];
	if (key !== undefined) {
		const value = inline ?? next;
		if (value === undefined) {
			return Either.left(new UsageError({ detail: `${name} requires a value` }));
		}
		return Either.right({
			state: { ...current, values: { ...current.values, [key]: value } },
			skipNext: inline === undefined,
		});
	}

	if (arg === "-d") {
		return Either.right({
			state: { ...current, descriptions: true },
			skipNext: false,
		});
	}
	if (arg === "-h" || arg === "--help") {
		return Either.right({ state: { ...current, help: true }, skipNext: false });
	}
	if (arg.startsWith("-") && arg.length > 1) {
		return Either.left(new UsageError({ detail: `unknown option ${arg}` }));
	}

	return Either.right({
		state: { ...current, positionals: [...current.positionals, arg] },
		skipNext: false,
	});
}

function parseDebug(
	value: string | undefined,
): Either.Either<DebugLevel, UsageError> {
	if (value === undefined) return Either.right(0);
	const level = Number.parseInt(value, 10);
	if (Number.isNaN(level) || level < 0) {
		return Either.left(
			new UsageError({ detail: `--debug expects 0, 1 or 2, got ${value}` }),
		);
	}
	return Either.right(level === 0 ? 0 : level === 1 ? 1 : 2);
}

function parseState(
	value: string | undefined,
): Either.Either<PullRequestState, UsageError> {
	if (value === undefined) return Either.right("open");
	const state = STATES.find((candidate) => candidate === value);
	return state === undefined
		? Either.left(
				new UsageError({
					detail: `unknown pull request state ${value}, expected open, merged or declined`,
				}),
			)
		: Either.right(state);
}

function buildCommand(state: ArgState): Either.Either<Command, UsageError> {
	const [target, verb, argument, ...extra] = state.positionals;
	if (state.help || target === undefined) {
		return Either.right({ kind: "help" });
	}
	if (extra.length > 0) {
		return Either.left(
			new UsageError({ detail: `unexpected arguments: ${extra.join(" ")}` }),
		);
	}

	switch (verb) {
		case "review":
			return argument === undefined
				? Either.left(
						new UsageError({ detail: "review needs the path of a file to review" }),
					)
				: Either.right({ kind: "review", target, file: argument });
		case "ls":
			return argument === undefined
				? Either.right({ kind: "ls", target })
				: Either.left(new UsageError({ detail: `unexpected argument ${argument}` }));
		case "ls-reviews":
			return parseState(argument).pipe(
				Either.map(
					(prState): Command => ({
						kind: "ls-reviews",
						target,
						state: prState,
						descriptions: state.descriptions,
					}),
				),
			);
		default:
			return Either.left(
				new UsageError({
					detail:
						verb === undefined
							? "missing command: review, ls or ls-reviews"
							: `unknown command ${verb}`,
				}),
			);
	}
}

/**
 * Parses command-line arguments.
 *
 * @param args rc-file arguments followed by `process.argv.slice(2)`
 * @returns Options or UsageError
 *
 * @pure true
 * @example
 * ```ts
 * parseCLIArgs(["--host", "stash.local", "CORE/api/7", "review", "src/a.ts"]);
 * // Right({ command: { kind: "review", target: "CORE/api/7", file: "src/a.ts" }, host: "stash.local", ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[],
): Either.Either<CLIOptions, UsageError> {
	let state: ArgState = {
		values: {},
		positionals: [],
		descriptions: false,
		help: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args[i + 1], state);
		if (Either.isLeft(result)) return Either.left(result.left);
		state = result.right.state;
		if (result.right.skipNext) i++;
	}

	const { values } = state;
	return Either.all({
		command: buildCommand(state),
		debug: parseDebug(values.debug),
	}).pipe(
		Either.map(
			({ command, debug }): CLIOptions => ({
				command,
				debug,
				user: values.user ?? null,
				pass: values.pass ?? null,
				editor: values.editor ?? null,
				host: values.host ?? null,
				project: values.project ?? null,
			}),
		),
	);
}
