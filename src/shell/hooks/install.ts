// CHANGE: pre-commit hook installer for the gate
// PURITY: SHELL
// EFFECT: Effect<HookInstallResult, ExternalToolError | FSError, ProcessRunner>
// INVARIANT: An existing hook is never overwritten
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { type ExternalToolError, FSError } from "../../core/errors.js";
import { resolveHooksDirectory } from "../git/repository.js";
import type { ProcessRunner } from "../utils/exec.js";
import { fs, path } from "../utils/node-mods.js";

export const HOOK_NAME = "pre-commit";

export const HOOK_SCRIPT = [
	"#!/bin/sh",
	"# Installed by commit-gate",
	'exec npx --no-install commit-gate "$@"',
	"",
].join("\n");

export interface HookInstallResult {
	readonly status: "installed" | "exists";
	readonly hookPath: string;
}

/**
 * Writes an executable pre-commit hook that runs the gate.
 *
 * @param repoRoot Repository root
 * @returns "exists" when a hook is already present (left untouched)
 */
export function installPreCommitHook(
	repoRoot: string,
): Effect.Effect<HookInstallResult, ExternalToolError | FSError, ProcessRunner> {
	return Effect.gen(function* () {
		const hooksDir = yield* resolveHooksDirectory(repoRoot);
		const hookPath = path.join(hooksDir, HOOK_NAME);
		if (fs.existsSync(hookPath)) {
			console.log(`hook exists: ${hookPath} (skipped)`);
			return { status: "exists", hookPath } as const;
		}
		yield* Effect.try({
			try: () => {
				fs.mkdirSync(hooksDir, { recursive: true });
				fs.writeFileSync(hookPath, HOOK_SCRIPT, { mode: 0o755 });
			},
			catch: (error) => new FSError({ detail: String(error), path: hookPath }),
		});
		console.log(`hook installed: ${hookPath}`);
		return { status: "installed", hookPath } as const;
	});
}
