// CHANGE: Isolated snapshot of the staged tree
// PURITY: SHELL
// EFFECT: Effect<A, E | ExternalToolError | FSError, R | ProcessRunner>
// INVARIANT: Snapshot content = index content; the directory never outlives withSnapshot
// COMPLEXITY: O(n) where n = bytes in the index

import { Effect } from "effect";

import { type ExternalToolError, FSError } from "../../core/errors.js";
import type { ProcessRunner } from "../utils/exec.js";
import { fs, os, path } from "../utils/node-mods.js";
import { runGit } from "./repository.js";

const SNAPSHOT_PREFIX = "commit-gate-";

/**
 * Temporary directory holding a byte-exact copy of the staged tree.
 */
export interface SnapshotWorkspace {
	readonly root: string;
}

/**
 * Recursively removes the workspace.
 *
 * @pure false (filesystem)
 * @invariant idempotent; succeeds when the directory is already gone
 */
export function destroySnapshot(
	workspace: SnapshotWorkspace,
): Effect.Effect<void, FSError> {
	return Effect.try({
		try: () => {
			fs.rmSync(workspace.root, { recursive: true, force: true });
		},
		catch: (error) =>
			new FSError({
				detail: `failed to remove snapshot: ${String(error)}`,
				path: workspace.root,
			}),
	});
}

function makeTempDirectory(): Effect.Effect<SnapshotWorkspace, FSError> {
	return Effect.try({
		try: () => ({
			root: fs.mkdtempSync(path.join(os.tmpdir(), SNAPSHOT_PREFIX)),
		}),
		catch: (error) =>
			new FSError({ detail: `failed to create snapshot: ${String(error)}` }),
	});
}

/**
 * Creates a fresh directory and checks the whole index out into it.
 *
 * On materialization failure the directory is removed before the error
 * propagates.
 *
 * @param repoRoot Repository whose index is materialized
 * @effect Effect<SnapshotWorkspace, ExternalToolError | FSError, ProcessRunner>
 */
export function createSnapshot(
	repoRoot: string,
): Effect.Effect<
	SnapshotWorkspace,
	ExternalToolError | FSError,
	ProcessRunner
> {
	return Effect.gen(function* () {
		const workspace = yield* makeTempDirectory();
		const prefix = `${workspace.root}${path.sep}`;
		yield* runGit(repoRoot, [
			"checkout-index",
			"--all",
			`--prefix=${prefix}`,
		]).pipe(Effect.tapError(() => Effect.orDie(destroySnapshot(workspace))));
		return workspace;
	});
}

/**
 * Scoped snapshot: acquires, runs `use`, and always releases.
 *
 * The release runs on success, on failure and on interruption. A failure to
 * remove the directory is a defect.
 *
 * @effect Effect<A, E | ExternalToolError | FSError, R | ProcessRunner>
 */
export function withSnapshot<A, E, R>(
	repoRoot: string,
	use: (workspace: SnapshotWorkspace) => Effect.Effect<A, E, R>,
): Effect.Effect<A, E | ExternalToolError | FSError, R | ProcessRunner> {
	return Effect.acquireUseRelease(createSnapshot(repoRoot), use, (workspace) =>
		Effect.orDie(destroySnapshot(workspace)),
	);
}
