// CHANGE: User-facing messages for application errors
// PURITY: CORE
// INVARIANT: Every AppError variant has a message
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import { describeMutation } from "../review/describe.js";

/**
 * @pure true
 * @example
 * ```ts
 * describeError(new NotFoundError({ path: "src/a.ts" }));
 * // "src/a.ts is not part of the pull request"
 * ```
 */
export function describeError(error: AppError): string {
	return match(error)
		.with({ _tag: "MalformedDocument" }, ({ detail }) => `cannot read review: ${detail}`)
		.with({ _tag: "NotFound" }, ({ path }) => `${path} is not part of the pull request`)
		.with(
			{ _tag: "VersionConflict" },
			({ mutation, detail }) => `${describeMutation(mutation)}: ${detail}`,
		)
		.with({ _tag: "RemoteError" }, ({ operation, detail }) => `${operation}: ${detail}`)
		.with({ _tag: "DecodeError" }, ({ entity, detail }) => `unexpected ${entity} payload: ${detail}`)
		.with({ _tag: "EditorError" }, ({ command, detail }) => `editor ${command}: ${detail}`)
		.with({ _tag: "FS" }, ({ detail }) => detail)
		.with({ _tag: "UsageError" }, ({ detail }) => detail)
		.exhaustive();
}
