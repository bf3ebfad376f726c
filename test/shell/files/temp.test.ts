// CHANGE: Specs for the temporary review file store
// PURITY: SHELL (temporary directory)

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeReviewFiles } from "../../../src/shell/files/temp.js";

describe("makeReviewFiles", () => {
	let directory = "";

	beforeEach(() => {
		directory = fs.mkdtempSync(path.join(os.tmpdir(), "diffnote-files-"));
	});

	afterEach(() => {
		fs.rmSync(directory, { recursive: true, force: true });
	});

	it("creates, reads back and removes a review file", async () => {
		const files = makeReviewFiles(directory);
		const file = await Effect.runPromise(files.create("@@ -1 +1 @@\n x\n"));

		expect(path.dirname(file)).toBe(directory);
		expect(path.basename(file)).toMatch(/^review\.diff\.[0-9a-f]{12}$/u);
		await expect(Effect.runPromise(files.read(file))).resolves.toBe(
			"@@ -1 +1 @@\n x\n",
		);

		await Effect.runPromise(files.remove(file));
		expect(fs.existsSync(file)).toBe(false);
	});

	it("gives distinct names to concurrent sessions", async () => {
		const files = makeReviewFiles(directory);
		const first = await Effect.runPromise(files.create("a"));
		const second = await Effect.runPromise(files.create("b"));
		expect(first).not.toBe(second);
	});

	it("fails with FSError for an unreadable file", async () => {
		const files = makeReviewFiles(directory);
		const result = await Effect.runPromise(
			Effect.either(files.read(path.join(directory, "missing"))),
		);
		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left._tag).toBe("FS");
			expect(result.left.path).toBe(path.join(directory, "missing"));
		}
	});

	it("treats removing a missing file as done", async () => {
		const files = makeReviewFiles(directory);
		await expect(
			Effect.runPromise(files.remove(path.join(directory, "gone"))),
		).resolves.toBeUndefined();
	});
});
