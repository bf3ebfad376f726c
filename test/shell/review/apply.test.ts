// CHANGE: Specs for sequential mutation replay
// PURITY: SHELL (in-process fake remote)
// INVARIANT: A VersionConflict skips one mutation, any other failure halts the rest

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { RemoteError, VersionConflict } from "../../../src/core/errors.js";
import { type Identity, Mutation } from "../../../src/core/types/index.js";
import { applyMutations } from "../../../src/shell/review/apply.js";
import { added, anchor, identity } from "../../utils/builders.js";

type Outcome = "ok" | "conflict" | "fail";

function fakeRemote(outcomes: readonly Outcome[]) {
	const attempted: Mutation[] = [];
	return {
		attempted,
		applyMutation: (mutation: Mutation) =>
			Effect.suspend((): Effect.Effect<Identity | null, VersionConflict | RemoteError> => {
				const outcome = outcomes[attempted.length] ?? "ok";
				attempted.push(mutation);
				switch (outcome) {
					case "ok":
						return Effect.succeed(null);
					case "conflict":
						return Effect.fail(new VersionConflict({ mutation, detail: "stale" }));
					case "fail":
						return Effect.fail(
							new RemoteError({ operation: "apply", status: 500, detail: "HTTP 500: boom" }),
						);
				}
			}),
	};
}

const mutations: readonly Mutation[] = [
	Mutation.Create({ path: "a.ts", anchor: anchor(0, 0, added("x", 1)), text: "one" }),
	Mutation.Update({ identity: identity("2", "0"), text: "two" }),
	Mutation.Delete({ identity: identity("3", "0") }),
	Mutation.Delete({ identity: identity("4", "0") }),
];

describe("applyMutations", () => {
	it("applies every mutation in order and reports progress", async () => {
		const remote = fakeRemote([]);
		const progress: string[] = [];

		const report = await Effect.runPromise(
			applyMutations(remote, mutations, (position, total, mutation) =>
				Effect.sync(() => {
					progress.push(`${position}/${total} ${mutation._tag}`);
				}),
			),
		);

		expect(report).toEqual({ total: 4, applied: mutations, conflicts: [], halted: null });
		expect(remote.attempted).toEqual(mutations);
		expect(progress).toEqual(["1/4 Create", "2/4 Update", "3/4 Delete", "4/4 Delete"]);
	});

	it("records conflicts and continues", async () => {
		const remote = fakeRemote(["ok", "conflict", "ok", "ok"]);
		const report = await Effect.runPromise(applyMutations(remote, mutations));

		expect(report.applied).toEqual([mutations[0], mutations[2], mutations[3]]);
		expect(report.conflicts.map((conflict) => conflict.mutation)).toEqual([mutations[1]]);
		expect(report.halted).toBeNull();
	});

	it("halts at the first unclassified failure", async () => {
		const remote = fakeRemote(["ok", "fail", "ok", "ok"]);
		const report = await Effect.runPromise(applyMutations(remote, mutations));

		expect(remote.attempted).toEqual([mutations[0], mutations[1]]);
		expect(report.applied).toEqual([mutations[0]]);
		expect(report.halted?.mutation).toEqual(mutations[1]);
		expect(report.halted?.remaining).toBe(2);
		expect(report.halted?.error.detail).toBe("HTTP 500: boom");
	});

	it("reports an empty change set as complete", async () => {
		await expect(
			Effect.runPromise(applyMutations(fakeRemote([]), [])),
		).resolves.toEqual({ total: 0, applied: [], conflicts: [], halted: null });
	});
});
