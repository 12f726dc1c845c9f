// CHANGE: Git queries consumed by the gate (file lists, repository layout)
// PURITY: SHELL
// EFFECT: Effect<string, ExternalToolError, ProcessRunner>
// INVARIANT: A git command exiting non-zero is fatal; no partial-result fallback
// COMPLEXITY: O(n) where n = size of git output

import { Effect } from "effect";

import { parseGitPathList } from "../../core/classify.js";
import { ExternalToolError } from "../../core/errors.js";
import { execProcess, type ProcessRunner } from "../utils/exec.js";
import { path } from "../utils/node-mods.js";

/**
 * Object name of the empty tree; the comparison base before the first commit.
 */
export const EMPTY_TREE = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

/**
 * Diff filter selecting added, copied, modified, renamed and type-changed paths.
 */
export const STAGED_DIFF_FILTER = "ACMRT";

/**
 * Runs git and returns stdout.
 *
 * @param cwd Working directory for git
 * @param args Arguments after `git`
 * @returns Effect with stdout, or ExternalToolError when git cannot run or exits non-zero
 */
export function runGit(
	cwd: string,
	args: readonly string[],
): Effect.Effect<string, ExternalToolError, ProcessRunner> {
	return execProcess({ command: "git", args, cwd }).pipe(
		Effect.mapError(
			(error) => new ExternalToolError({ tool: "git", reason: error.detail }),
		),
		Effect.flatMap((result) =>
			result.exitCode === 0
				? Effect.succeed(result.stdout)
				: Effect.fail(
						new ExternalToolError({
							tool: "git",
							reason: `git ${args.join(" ")} exited with status ${result.exitCode}: ${result.stderr.trim()}`,
						}),
					),
		),
	);
}

/**
 * True when HEAD resolves to a commit.
 *
 * @effect Effect<boolean, ExternalToolError, ProcessRunner>
 */
export function hasHeadCommit(
	repoRoot: string,
): Effect.Effect<boolean, ExternalToolError, ProcessRunner> {
	return execProcess({
		command: "git",
		args: ["rev-parse", "--verify", "--quiet", "HEAD^{commit}"],
		cwd: repoRoot,
	}).pipe(
		Effect.mapError(
			(error) => new ExternalToolError({ tool: "git", reason: error.detail }),
		),
		Effect.map((result) => result.exitCode === 0),
	);
}

/**
 * Paths staged for the pending commit (A, C, M, R, T) relative to HEAD, or to
 * the empty tree in a repository without commits.
 */
export function listStagedPaths(
	repoRoot: string,
): Effect.Effect<readonly string[], ExternalToolError, ProcessRunner> {
	return Effect.gen(function* () {
		const base = (yield* hasHeadCommit(repoRoot)) ? "HEAD" : EMPTY_TREE;
		const stdout = yield* runGit(repoRoot, [
			"diff",
			"--cached",
			"--name-only",
			"-z",
			`--diff-filter=${STAGED_DIFF_FILTER}`,
			base,
		]);
		return parseGitPathList(stdout);
	});
}

/**
 * Every path tracked at HEAD; the index listing before the first commit.
 */
export function listTrackedPaths(
	repoRoot: string,
): Effect.Effect<readonly string[], ExternalToolError, ProcessRunner> {
	return Effect.gen(function* () {
		const args = (yield* hasHeadCommit(repoRoot))
			? ["ls-tree", "-r", "-z", "--name-only", "HEAD"]
			: ["ls-files", "-z"];
		return parseGitPathList(yield* runGit(repoRoot, args));
	});
}

/**
 * Absolute path of the working tree root containing `cwd`.
 */
export function resolveRepositoryRoot(
	cwd: string,
): Effect.Effect<string, ExternalToolError, ProcessRunner> {
	return runGit(cwd, ["rev-parse", "--show-toplevel"]).pipe(
		Effect.map((stdout) => path.resolve(stdout.trim())),
	);
}

/**
 * Absolute path of the hooks directory (honours core.hooksPath and worktrees).
 */
export function resolveHooksDirectory(
	repoRoot: string,
): Effect.Effect<string, ExternalToolError, ProcessRunner> {
	return runGit(repoRoot, ["rev-parse", "--git-path", "hooks"]).pipe(
		Effect.map((stdout) => path.resolve(repoRoot, stdout.trim())),
	);
}
