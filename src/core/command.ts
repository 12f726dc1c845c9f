// CHANGE: Command-line rendering shared by invocation logs and remediation text
// FORMAT THEOREM: ∀argv: formatCommand(argv) pasted into a POSIX shell yields argv
// PURITY: CORE
// COMPLEXITY: O(n) where n = total argument length

const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/u;

/**
 * Quotes a single argument for a POSIX shell when needed.
 *
 * @pure true
 */
export function quoteArgument(arg: string): string {
	if (arg.length === 0) return "''";
	if (SAFE_ARGUMENT.test(arg)) return arg;
	return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * @pure true
 * @example formatCommand("jshint", ["a b.js"]) === "jshint 'a b.js'"
 */
export function formatCommand(command: string, args: readonly string[]): string {
	return [command, ...args].map(quoteArgument).join(" ");
}

/**
 * Rewrites snapshot-rooted paths in tool output to repository-relative ones.
 *
 * @param output Raw tool output
 * @param snapshotRoot Absolute snapshot directory
 * @pure true
 */
export function relativizeOutput(output: string, snapshotRoot: string): string {
	if (snapshotRoot.length === 0) return output;
	return output
		.split(`${snapshotRoot}/`)
		.join("")
		.split(snapshotRoot)
		.join(".");
}

/**
 * Joins stdout and stderr, dropping empty streams.
 *
 * @pure true
 */
export function combineOutput(stdout: string, stderr: string): string {
	return [stdout.trimEnd(), stderr.trimEnd()]
		.filter((part) => part.length > 0)
		.join("\n");
}
