// CHANGE: Specs for resolving pull-request and repository targets
// PURITY: CORE

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	normalizeHost,
	resolvePullRequest,
	resolveRepository,
	type TargetDefaults,
} from "../../../src/core/config/target.js";

const withHost: TargetDefaults = { host: "stash.local/", project: null };

describe("normalizeHost", () => {
	it("adds http:// to bare hosts and drops trailing slashes", () => {
		expect(normalizeHost("stash.local//")).toBe("http://stash.local");
		expect(normalizeHost("https://stash.local")).toBe("https://stash.local");
	});
});

describe("resolvePullRequest", () => {
	it("reads a pull-request URL", () => {
		expect(
			resolvePullRequest(
				"https://stash.local/git/projects/CORE/repos/api/pull-requests/17/overview",
				{ host: null, project: null },
			),
		).toEqual(
			Either.right({
				host: "https://stash.local/git",
				namespace: "projects",
				project: "CORE",
				repo: "api",
				pr: 17,
			}),
		);
	});

	it("requires the pull-request id in URLs", () => {
		expect(
			Either.isLeft(
				resolvePullRequest("https://stash.local/projects/CORE/repos/api", withHost),
			),
		).toBe(true);
	});

	it("resolves project/repo/pr with --host", () => {
		expect(resolvePullRequest("CORE/api/3", withHost)).toEqual(
			Either.right({
				host: "http://stash.local",
				namespace: "projects",
				project: "CORE",
				repo: "api",
				pr: 3,
			}),
		);
	});

	it("resolves personal repositories marked with ~ or %", () => {
		for (const raw of ["~jane/dotfiles/3", "%jane/dotfiles/3"]) {
			expect(resolvePullRequest(raw, withHost)).toEqual(
				Either.right({
					host: "http://stash.local",
					namespace: "users",
					project: "jane",
					repo: "dotfiles",
					pr: 3,
				}),
			);
		}
	});

	it("completes shorter forms from --project", () => {
		expect(
			resolvePullRequest("api/4", { host: "stash.local", project: "CORE" }),
		).toEqual(
			Either.right({
				host: "http://stash.local",
				namespace: "projects",
				project: "CORE",
				repo: "api",
				pr: 4,
			}),
		);
		expect(
			resolvePullRequest("5", { host: "stash.local", project: "CORE/api" }),
		).toEqual(
			Either.right({
				host: "http://stash.local",
				namespace: "projects",
				project: "CORE",
				repo: "api",
				pr: 5,
			}),
		);
	});

	it("rejects shorthands without host, project or a valid id", () => {
		const noHost = resolvePullRequest("CORE/api/3", { host: null, project: null });
		expect(Either.isLeft(noHost) && noHost.left.detail).toBe(
			"--host is required for shorthand targets",
		);
		expect(Either.isLeft(resolvePullRequest("api/4", withHost))).toBe(true);
		expect(Either.isLeft(resolvePullRequest("CORE/api/abc", withHost))).toBe(true);
		expect(Either.isLeft(resolvePullRequest("CORE/api/0", withHost))).toBe(true);
	});
});

describe("resolveRepository", () => {
	it("reads repository URLs and shorthands", () => {
		expect(
			resolveRepository("http://stash.local/users/jane/repos/dotfiles/browse", {
				host: null,
				project: null,
			}),
		).toEqual(
			Either.right({
				host: "http://stash.local",
				namespace: "users",
				project: "jane",
				repo: "dotfiles",
			}),
		);
		expect(resolveRepository("CORE/api", withHost)).toEqual(
			Either.right({
				host: "http://stash.local",
				namespace: "projects",
				project: "CORE",
				repo: "api",
			}),
		);
		expect(
			resolveRepository("api", { host: "stash.local", project: "CORE" }),
		).toEqual(
			Either.right({
				host: "http://stash.local",
				namespace: "projects",
				project: "CORE",
				repo: "api",
			}),
		);
	});

	it("rejects a bare name without --project", () => {
		const result = resolveRepository("api", withHost);
		expect(Either.isLeft(result) && result.left.detail).toBe(
			"repository should be given as a URL (http[s]://<host>/(users|projects)/<project>/repos/<repo>/pull-requests/<id>) or as <project>/<repo>",
		);
	});
});
