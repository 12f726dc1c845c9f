// CHANGE: Programmatic entry: parse flags, resolve the repository, run the gate
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value; fatal errors stay in the error channel
// COMPLEXITY: O(1) besides the gate run

import { Effect } from "effect";

import { runGate } from "./app/runGate.js";
import { computeExitCode } from "./core/decision.js";
import type { AppError } from "./core/errors.js";
import type { CLIOptions, ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/cli.js";
import { loadGateConfig } from "./shell/config/loader.js";
import { resolveRepositoryRoot } from "./shell/git/repository.js";
import { installPreCommitHook } from "./shell/hooks/install.js";
import type { ProcessRunner } from "./shell/utils/exec.js";

/**
 * Runs the command described by `options` from `cwd`.
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function runCommand(
	options: CLIOptions,
	cwd: string,
): Effect.Effect<ExitCode, AppError, ProcessRunner> {
	return Effect.gen(function* () {
		if (options.help) {
			console.log(USAGE);
			return 0 as const;
		}
		const repoRoot = yield* resolveRepositoryRoot(cwd);
		if (options.installHook) {
			yield* installPreCommitHook(repoRoot);
			return 0 as const;
		}
		const config = yield* loadGateConfig(repoRoot);
		const result = yield* runGate({ repoRoot, force: options.force, config });
		return computeExitCode({ verdicts: result.verdicts });
	});
}

/**
 * Entry for programmatic usage (without terminating process).
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode, AppError, ProcessRunner> {
	return runCommand(parseCLIArgs(args), process.cwd());
}
