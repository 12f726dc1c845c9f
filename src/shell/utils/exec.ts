// CHANGE: Process execution behind an Effect service
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<ProcessResult, ExecError, ProcessRunner>
// INVARIANT: ∀ request: run(request) → ProcessResult(exitCode ∈ ℕ) ∨ ExecError(spawn/signal failure)
// COMPLEXITY: O(1) time, O(n) space where n = captured output length

import { Context, Effect, Layer } from "effect";

import { formatCommand } from "../../core/command.js";
import { ExecError } from "../../core/errors.js";
import { execFile } from "./node-mods.js";

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Process to start. Arguments are passed verbatim, no shell involved.
 */
export interface ProcessRequest {
	readonly command: string;
	readonly args: readonly string[];
	readonly cwd: string;
}

/**
 * Captured outcome of a process that ran to completion.
 *
 * @invariant exitCode >= 0
 */
export interface ProcessResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Runs one process without a timeout, blocking the calling fiber until exit.
 *
 * A non-zero exit status is a result, not an error: adapters decide what it
 * means. Only a failure to spawn (e.g. ENOENT) or termination by a signal
 * fails the effect.
 *
 * @pure false (spawns a process)
 * @effect Effect<ProcessResult, ExecError>
 */
export function runProcess(
	request: ProcessRequest,
): Effect.Effect<ProcessResult, ExecError> {
	return Effect.async<ProcessResult, ExecError>((resume) => {
		execFile(
			request.command,
			request.args,
			{ cwd: request.cwd, encoding: "utf8", maxBuffer: MAX_BUFFER },
			(error, stdout, stderr) => {
				if (error === null) {
					resume(Effect.succeed({ exitCode: 0, stdout, stderr }));
					return;
				}
				if (typeof error.code === "number") {
					resume(Effect.succeed({ exitCode: error.code, stdout, stderr }));
					return;
				}
				resume(
					Effect.fail(
						new ExecError({
							command: formatCommand(request.command, request.args),
							detail: error.message,
						}),
					),
				);
			},
		);
	});
}

/**
 * Service through which every external process is started.
 */
export class ProcessRunner extends Context.Tag("ProcessRunner")<
	ProcessRunner,
	{
		readonly run: (
			request: ProcessRequest,
		) => Effect.Effect<ProcessResult, ExecError>;
	}
>() {}

export const ProcessRunnerLive = Layer.succeed(ProcessRunner, {
	run: runProcess,
});

/**
 * Runs a request through the current ProcessRunner.
 *
 * @effect Effect<ProcessResult, ExecError, ProcessRunner>
 */
export function execProcess(
	request: ProcessRequest,
): Effect.Effect<ProcessResult, ExecError, ProcessRunner> {
	return Effect.flatMap(ProcessRunner, (runner) => runner.run(request));
}
