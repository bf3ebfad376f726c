// CHANGE: Hide passwords before arguments reach the debug log
// PURITY: CORE
// INVARIANT: No value following -p/--pass survives in the output
// COMPLEXITY: O(n) where n = number of arguments

const PASSWORD_FLAGS: ReadonlySet<string> = new Set(["-p", "--pass"]);

export const REDACTED = "******";

/**
 * Joins arguments for logging with password values masked.
 *
 * @pure true
 * @example
 * ```ts
 * redactArgs(["-u", "jane", "--pass=test-secret", "CORE/api/1", "ls"]);
 * // "-u jane --pass=****** CORE/api/1 ls"
 * ```
 */
export function redactArgs(args: readonly string[]): string {
	return args
		.map((arg, index) => {
			const eq = arg.indexOf("=");
			if (eq > 0 && PASSWORD_FLAGS.has(arg.slice(0, eq))) {
				return `${arg.slice(0, eq + 1)}${REDACTED}`;
			}
			const previous = index > 0 ? args[index - 1] : undefined;
			return previous !== undefined && PASSWORD_FLAGS.has(previous)
				? REDACTED
				: arg;
		})
		.join(" ");
}
