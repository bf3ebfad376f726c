// CHANGE: Central export file for all type definitions
// PURITY: CORE (re-exports only)
// COMPLEXITY: O(1)

export type { CLIOptions, Command, DebugLevel } from "./config.js";
export type {
	EditorPort,
	RepositoryRemote,
	ReviewFiles,
	ReviewRemote,
} from "./ports.js";
export type {
	Annotation,
	DiffLine,
	DiffModel,
	DocumentContext,
	Hunk,
	Identity,
	LineAnchor,
	LineKind,
	LocatedAnnotation,
	ParsedDocument,
	ParseWarning,
} from "./review.js";
export { Mutation } from "./review.js";
export type {
	ChangedFile,
	PullRequestState,
	PullRequestSummary,
	PullRequestTarget,
	RepoTarget,
	RequestSpec,
} from "./stash.js";
