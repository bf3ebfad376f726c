// CHANGE: Temporary storage of the review document
// PURITY: SHELL (filesystem)
// INVARIANT: create never overwrites an existing file
// COMPLEXITY: O(n) where n = document size

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import type { ReviewFiles } from "../../core/types/ports.js";
import { fs, os, path, randomBytes } from "../utils/node-mods.js";

function fsError(action: string, file: string, error: unknown): FSError {
	const reason = error instanceof Error ? error.message : String(error);
	return new FSError({ detail: `cannot ${action} ${file}: ${reason}`, path: file });
}

/**
 * Review files stored as `review.diff.<random>` in a directory.
 *
 * @param directory Defaults to the OS temp directory
 */
export function makeReviewFiles(directory: string = os.tmpdir()): ReviewFiles {
	return {
		create: (text) => {
			const file = path.join(
				directory,
				`review.diff.${randomBytes(6).toString("hex")}`,
			);
			return Effect.try({
				try: () => {
					fs.writeFileSync(file, text, { encoding: "utf8", flag: "wx" });
					return file;
				},
				catch: (error) => fsError("write", file, error),
			});
		},
		read: (file) =>
			Effect.try({
				try: () => fs.readFileSync(file, "utf8"),
				catch: (error) => fsError("read", file, error),
			}),
		remove: (file) =>
			Effect.try({
				try: () => {
					fs.rmSync(file, { force: true });
				},
				catch: (error) => fsError("remove", file, error),
			}),
	};
}
