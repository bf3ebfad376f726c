// CHANGE: Application layer orchestration of one review session
// PURITY: APP (no process.exit; composition of CORE with ports)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Nothing is applied unless the editor exited with status 0 and the document parsed
// INVARIANT: The edited document is removed only after every mutation was applied
// COMPLEXITY: O(n + m) where n = document lines, m = mutations

import { Effect } from "effect";

import { computeExitCode, isComplete } from "../core/decision.js";
import { renderDocument } from "../core/document/render.js";
import { parseDocument } from "../core/document/parse.js";
import { EditorError, type AppError } from "../core/errors.js";
import { describeError } from "../core/format/error.js";
import type { ExitCode } from "../core/models.js";
import { countAnnotations } from "../core/review/annotations.js";
import { describeMutation, summarizeApply } from "../core/review/describe.js";
import { diffReviews } from "../core/review/diff.js";
import type { EditorPort, ReviewFiles, ReviewRemote } from "../core/types/ports.js";
import type { DocumentContext } from "../core/types/review.js";
import { applyMutations } from "../shell/review/apply.js";

export type Printer = (line: string) => Effect.Effect<void>;

export const consolePrinter: Printer = (line) =>
	Effect.sync(() => {
		console.log(line);
	});

/**
 * Collaborators of a review session.
 */
export interface ReviewDeps {
	readonly remote: ReviewRemote;
	readonly editor: EditorPort;
	readonly files: ReviewFiles;
	readonly print: Printer;
}

function keptNotice(file: string): string {
	return `your edits are kept in ${file}`;
}

function session(
	deps: ReviewDeps,
	context: DocumentContext,
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		const original = yield* deps.remote.fetchDiff(context.path);
		yield* Effect.logInfo(
			`fetched ${original.path}: ${original.hunks.length} hunks, ${countAnnotations(original)} comments`,
		);

		const file = yield* deps.files.create(renderDocument(original, context));
		yield* Effect.logDebug(`review written to ${file}`);

		const status = yield* deps.editor.runEditor(file);
		if (status !== 0) {
			yield* deps.print(keptNotice(file));
			return yield* Effect.fail(
				new EditorError({
					command: deps.editor.command,
					detail: `editor exited with status ${status}, nothing was applied`,
				}),
			);
		}

		const text = yield* deps.files.read(file);
		const parsed = yield* parseDocument(text, context).pipe(
			Effect.tapError(() => deps.print(keptNotice(file))),
		);
		for (const warning of parsed.warnings) {
			yield* Effect.logWarning(`${file}:${warning.line}: ${warning.detail}`);
		}

		const mutations = diffReviews(original, parsed.model);
		if (mutations.length === 0) {
			yield* Effect.logWarning("no changes detected in review file");
			yield* deps.files.remove(file);
			return 0;
		}

		yield* Effect.logDebug(`applying ${mutations.length} changes`);
		const report = yield* applyMutations(
			deps.remote,
			mutations,
			(position, total, mutation) =>
				deps.print(`(${position}/${total}) ${describeMutation(mutation)}`),
		);

		for (const line of summarizeApply(report)) {
			yield* deps.print(line);
		}
		if (isComplete(report)) {
			yield* deps.files.remove(file);
		} else {
			yield* deps.print(keptNotice(file));
		}
		return computeExitCode(report);
	});
}

/**
 * Runs fetch → render → edit → parse → diff → apply for one file.
 *
 * @param deps Ports and printer
 * @param context File under review and renderer settings
 * @returns Effect<ExitCode, never>; errors are logged, not propagated
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 */
export function runReview(
	deps: ReviewDeps,
	context: DocumentContext,
): Effect.Effect<ExitCode> {
	return session(deps, context).pipe(
		Effect.catchAll((error) =>
			Effect.logError(describeError(error)).pipe(Effect.as<ExitCode>(1)),
		),
	);
}
