// CHANGE: Shared invocation path for checker engines
// PURITY: SHELL
// EFFECT: Effect<ProcessResult, ExternalToolError, ProcessRunner>
// INVARIANT: Logged command string equals the executed argv
// COMPLEXITY: O(1) besides the process itself

import { Effect } from "effect";

import { formatCommand } from "../../core/command.js";
import { ExternalToolError, type ToolName } from "../../core/errors.js";
import type { ToolCommand } from "../../core/models.js";
import type { SnapshotWorkspace } from "../git/snapshot.js";
import {
	execProcess,
	type ProcessResult,
	type ProcessRunner,
} from "../utils/exec.js";

/**
 * Everything an adapter needs for one run.
 *
 * @property repoRoot Real repository root (configuration files live here)
 * @property snapshot Isolated staged tree every check runs against
 */
export interface CheckerContext {
	readonly repoRoot: string;
	readonly snapshot: SnapshotWorkspace;
	readonly tool: ToolCommand;
}

/**
 * Starts a checker engine inside the snapshot and prints the exact command.
 *
 * @param toolName Engine the failure is attributed to
 * @param context Adapter context
 * @param args Arguments appended after the configured tool prefix
 * @returns Completed process; spawn failures become ExternalToolError
 */
export function invokeChecker(
	toolName: ToolName,
	context: CheckerContext,
	args: readonly string[],
): Effect.Effect<ProcessResult, ExternalToolError, ProcessRunner> {
	const fullArgs = [...context.tool.args, ...args];
	return Effect.gen(function* () {
		console.log(`   ↳ Command: ${formatCommand(context.tool.command, fullArgs)}`);
		return yield* execProcess({
			command: context.tool.command,
			args: fullArgs,
			cwd: context.snapshot.root,
		}).pipe(
			Effect.mapError(
				(error) =>
					new ExternalToolError({
						tool: toolName,
						reason: `failed to run ${error.command}: ${error.detail}`,
					}),
			),
		);
	});
}

/**
 * Reproduction command for the real tree, using the configured tool prefix.
 *
 * @pure true
 */
export function reproductionCommand(
	context: CheckerContext,
	args: readonly string[],
): string {
	return formatCommand(context.tool.command, [...context.tool.args, ...args]);
}
