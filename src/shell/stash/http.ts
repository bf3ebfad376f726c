// CHANGE: HTTP transport for Stash REST requests built by the core
// PURITY: SHELL (network)
// INVARIANT: Transport failures become RemoteError with status = null
// COMPLEXITY: O(n) where n = response size

import { Effect } from "effect";

import { RemoteError } from "../../core/errors.js";
import type { RequestSpec } from "../../core/types/stash.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface StashCredentials {
	readonly user: string;
	readonly pass: string;
}

/**
 * Response with its body parsed as JSON when possible, raw text otherwise.
 */
export interface HttpResponse {
	readonly status: number;
	readonly body: unknown;
}

export interface StashTransport {
	readonly send: (
		operation: string,
		request: RequestSpec,
	) => Effect.Effect<HttpResponse, RemoteError>;
}

/**
 * Full URL of a request.
 *
 * @pure true
 * @example
 * ```ts
 * requestUrl("http://stash.local", { method: "GET", path: "/rest/api/1.0/x", query: { limit: "10" }, body: null });
 * // "http://stash.local/rest/api/1.0/x?limit=10"
 * ```
 */
export function requestUrl(host: string, request: RequestSpec): string {
	const query = new URLSearchParams(request.query).toString();
	return query.length === 0
		? `${host}${request.path}`
		: `${host}${request.path}?${query}`;
}

export function basicAuth(credentials: StashCredentials): string {
	const token = Buffer.from(`${credentials.user}:${credentials.pass}`).toString(
		"base64",
	);
	return `Basic ${token}`;
}

function parseBody(text: string): unknown {
	if (text.length === 0) return null;
	try {
		const parsed: unknown = JSON.parse(text);
		return parsed;
	} catch {
		return text;
	}
}

/**
 * Transport bound to one Stash host and user.
 *
 * @param fetchImpl Injected for tests; defaults to the global fetch
 */
export function makeStashTransport(
	host: string,
	credentials: StashCredentials,
	fetchImpl: FetchLike = fetch,
): StashTransport {
	const authorization = basicAuth(credentials);

	return {
		send: (operation, request) => {
			const url = requestUrl(host, request);
			const headers: Record<string, string> = {
				Accept: "application/json",
				Authorization: authorization,
			};
			if (request.body !== null) headers["Content-Type"] = "application/json";
			const init: RequestInit = {
				method: request.method,
				headers,
				...(request.body === null ? {} : { body: JSON.stringify(request.body) }),
			};

			return Effect.logDebug(`${request.method} ${url}`).pipe(
				Effect.zipRight(
					Effect.tryPromise({
						try: async () => {
							const response = await fetchImpl(url, init);
							return {
								status: response.status,
								body: parseBody(await response.text()),
							};
						},
						catch: (error) =>
							new RemoteError({
								operation,
								status: null,
								detail: error instanceof Error ? error.message : String(error),
							}),
					}),
				),
			);
		},
	};
}
