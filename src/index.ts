// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: SHELL adapters are exported only as port factories
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs the command line in-process.
 *
 * @example
 * ```typescript
 * import { main } from "diffnote";
 *
 * const exitCode = await main(["--user=jane", "--pass=test-secret", "--host=stash.local", "PRJ/app/7", "ls"]);
 * ```
 */
export { main, processIO } from "./main.js";
export { type CliIO, runCli } from "./app/runCli.js";
export { runListFiles, runListReviews } from "./app/runList.js";
export {
	consolePrinter,
	type Printer,
	type ReviewDeps,
	runReview,
} from "./app/runReview.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { renderDocument } from "./core/document/render.js";
export { parseDocument } from "./core/document/parse.js";
export { diffReviews } from "./core/review/diff.js";
export { describeMutation, summarizeApply } from "./core/review/describe.js";
export { computeExitCode, isComplete } from "./core/decision.js";
export type { ApplyReport, ExitCode, HaltedApply } from "./core/models.js";
export * from "./core/errors.js";
export * from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (port implementations)
// ═══════════════════════════════════════════════════════════════════════════════

export { applyMutations } from "./shell/review/apply.js";
export { makeStashTransport } from "./shell/stash/http.js";
export { makeStashRepository, makeStashReview } from "./shell/stash/remote.js";
export { makeEditor } from "./shell/editor/editor.js";
export { makeReviewFiles } from "./shell/files/temp.js";
