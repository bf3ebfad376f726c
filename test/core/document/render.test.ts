// CHANGE: Specs for rendering a diff model as an editable document
// PURITY: CORE
// COMPLEXITY: O(n) per assertion

import { describe, expect, it } from "vitest";

import {
	instructionLines,
	renderDocument,
} from "../../../src/core/document/render.js";
import { sampleModel } from "../../utils/builders.js";

describe("renderDocument", () => {
	it("renders headers, hunks, lines and comments in order", () => {
		const text = renderDocument(sampleModel(), {
			path: "src/app.ts",
			instructions: false,
		});

		expect(text.split("\n")).toEqual([
			"--- a/src/app.ts",
			"+++ b/src/app.ts",
			"@@ -10,2 +10,2 @@ function setup()",
			" const a = 1;",
			"# [7@1] why one?",
			"-const b = 2;",
			"+const b = 3;",
			"@@ -40,1 +40,2 @@",
			" }",
			"+export { a };",
			"# [9@4] rename",
			"#| please",
			"",
		]);
	});

	it("prepends ## instructions when requested", () => {
		const text = renderDocument(sampleModel(), {
			path: "src/app.ts",
			instructions: true,
		});
		const lines = text.split("\n");

		expect(lines[0]).toBe("## Review of src/app.ts");
		expect(lines.indexOf("--- a/src/app.ts")).toBe(
			instructionLines("src/app.ts").length,
		);
		expect(
			lines
				.slice(0, instructionLines("src/app.ts").length)
				.every((line) => line.startsWith("##")),
		).toBe(true);
	});

	it("ends with exactly one newline", () => {
		const text = renderDocument(sampleModel(), {
			path: "src/app.ts",
			instructions: false,
		});
		expect(text.endsWith("@@ -40,1 +40,2 @@\n }\n+export { a };\n# [9@4] rename\n#| please\n")).toBe(true);
	});
});
