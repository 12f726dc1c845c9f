// CHANGE: CLI argument parsing for the gate
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Unknown arguments are ignored; parsing never throws
// COMPLEXITY: O(n) where n = |args|

import type { CLIOptions } from "../../core/models.js";

type BooleanFlag = keyof CLIOptions;

const FLAGS: Readonly<Record<string, BooleanFlag>> = {
	"--force": "force",
	"-f": "force",
	"--install-hook": "installHook",
	"--help": "help",
	"-h": "help",
};

export const USAGE = [
	"Usage: commit-gate [--force] [--install-hook] [--help]",
	"",
	"  -f, --force         check every tracked file, even with nothing staged",
	"      --install-hook  install a git pre-commit hook that runs commit-gate",
	"  -h, --help          show this message",
].join("\n");

/**
 * Parses command-line flags.
 *
 * @param args Arguments after the executable (defaults to process.argv)
 * @returns Options with every flag defaulting to false
 *
 * @example
 * ```ts
 * parseCLIArgs(["--force"]); // { force: true, installHook: false, help: false }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: CLIOptions = { force: false, installHook: false, help: false };
	for (const arg of args) {
		if (arg.length === 0) continue;
		const flag = FLAGS[arg];
		if (flag !== undefined) {
			state = { ...state, [flag]: true };
		}
	}
	return state;
}
