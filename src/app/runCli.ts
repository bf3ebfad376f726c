// CHANGE: Dispatch parsed command-line options to the review and listing commands
// PURITY: APP (no process.exit; builds SHELL adapters and delegates)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Passwords never reach the log unredacted
// COMPLEXITY: O(n) where n = number of arguments

import { Effect, Either } from "effect";

import { parseCLIArgs } from "../core/config/cli.js";
import { redactArgs } from "../core/config/redact.js";
import { resolvePullRequest, resolveRepository } from "../core/config/target.js";
import { USAGE } from "../core/config/usage.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/config.js";
import type { EditorPort, ReviewFiles } from "../core/types/ports.js";
import { loadRcArgs, rcPath } from "../shell/config/rc.js";
import { loggerLayer } from "../shell/logger.js";
import {
	type FetchLike,
	makeStashTransport,
	type StashTransport,
} from "../shell/stash/http.js";
import { makeStashRepository, makeStashReview } from "../shell/stash/remote.js";
import { runListFiles, runListReviews } from "./runList.js";
import { type Printer, runReview } from "./runReview.js";

/**
 * Process-level collaborators, injected so the CLI runs in-process in tests.
 */
export interface CliIO {
	readonly env: NodeJS.ProcessEnv;
	readonly fetch: FetchLike;
	readonly print: Printer;
	readonly makeEditor: (command: string) => EditorPort;
	readonly files: ReviewFiles;
}

function fail(message: string): Effect.Effect<ExitCode> {
	return Effect.logError(message).pipe(Effect.as<ExitCode>(1));
}

function transportFor(
	host: string,
	options: CLIOptions,
	io: CliIO,
): StashTransport | null {
	if (options.user === null || options.pass === null) return null;
	return makeStashTransport(
		host,
		{ user: options.user, pass: options.pass },
		io.fetch,
	);
}

function dispatch(options: CLIOptions, io: CliIO): Effect.Effect<ExitCode> {
	const { command } = options;
	const defaults = { host: options.host, project: options.project };
	const missingCredentials = "--user and --pass should be specified";

	switch (command.kind) {
		case "help":
			return io.print(USAGE).pipe(Effect.as<ExitCode>(0));

		case "review": {
			const editor = options.editor ?? io.env["EDITOR"] ?? "";
			if (editor.trim().length === 0) {
				return fail("either -e or $EDITOR should specify the editor to use");
			}
			const target = resolvePullRequest(command.target, defaults);
			if (Either.isLeft(target)) return fail(target.left.detail);
			const transport = transportFor(target.right.host, options, io);
			if (transport === null) return fail(missingCredentials);
			return runReview(
				{
					remote: makeStashReview(transport, target.right),
					editor: io.makeEditor(editor),
					files: io.files,
					print: io.print,
				},
				{ path: command.file, instructions: true },
			);
		}

		case "ls": {
			const target = resolvePullRequest(command.target, defaults);
			if (Either.isLeft(target)) return fail(target.left.detail);
			const transport = transportFor(target.right.host, options, io);
			if (transport === null) return fail(missingCredentials);
			return runListFiles(makeStashReview(transport, target.right), io.print);
		}

		case "ls-reviews": {
			const target = resolveRepository(command.target, defaults);
			if (Either.isLeft(target)) return fail(target.left.detail);
			const transport = transportFor(target.right.host, options, io);
			if (transport === null) return fail(missingCredentials);
			return runListReviews(
				makeStashRepository(transport, target.right),
				command.state,
				command.descriptions,
				io.print,
			);
		}
	}
}

/**
 * Runs the command line: rc file, argv parsing, logger setup, dispatch.
 *
 * @param argv Arguments after the script name
 * @returns Effect<ExitCode, never>
 *
 * @pure false (IO through `io`), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 */
export function runCli(
	argv: readonly string[],
	io: CliIO,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const rcArgs = yield* loadRcArgs(rcPath(io.env));
		const args = [...rcArgs, ...argv];
		const parsed = parseCLIArgs(args);

		if (Either.isLeft(parsed)) {
			yield* io.print(USAGE);
			return yield* fail(parsed.left.detail);
		}

		const options = parsed.right;
		return yield* Effect.logDebug(`command line: ${redactArgs(args)}`).pipe(
			Effect.zipRight(dispatch(options, io)),
			Effect.provide(loggerLayer(options.debug)),
		);
	}).pipe(Effect.provide(loggerLayer(0)));
}
