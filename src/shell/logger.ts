// CHANGE: Effect logger writing `HH:MM:SS.cc [LEVL] message` lines to stderr
// PURITY: SHELL (writes to stderr)
// INVARIANT: stdout stays reserved for listings, progress and summaries
// COMPLEXITY: O(n) per record where n = message length

import { Layer, Logger, LogLevel } from "effect";

import type { DebugLevel } from "../core/types/config.js";

/**
 * Minimum level shown for a `--debug` value.
 *
 * @pure true
 */
export function levelFor(debug: DebugLevel): LogLevel.LogLevel {
	switch (debug) {
		case 0:
			return LogLevel.Warning;
		case 1:
			return LogLevel.Info;
		case 2:
			return LogLevel.Debug;
	}
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

export function messageText(message: unknown): string {
	const parts: readonly unknown[] = Array.isArray(message) ? message : [message];
	return parts
		.map((part) => (typeof part === "string" ? part : JSON.stringify(part)))
		.join(" ");
}

/**
 * Formats one log record.
 *
 * @pure true
 * @example
 * ```ts
 * formatLogLine(new Date(2024, 0, 1, 9, 5, 3, 120), "INFO", ["fetched diff"]);
 * // "09:05:03.12 [INFO] fetched diff"
 * ```
 */
export function formatLogLine(
	date: Date,
	label: string,
	message: unknown,
): string {
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(Math.floor(date.getMilliseconds() / 10))}`;
	return `${time} [${label.slice(0, 4)}] ${messageText(message)}`;
}

export const stderrLogger = Logger.make(({ date, logLevel, message }) => {
	process.stderr.write(`${formatLogLine(date, logLevel.label, message)}\n`);
});

/**
 * Layer installing the stderr logger at the requested verbosity.
 */
export function loggerLayer(debug: DebugLevel): Layer.Layer<never> {
	return Layer.merge(
		Logger.replace(Logger.defaultLogger, stderrLogger),
		Logger.minimumLogLevel(levelFor(debug)),
	);
}
