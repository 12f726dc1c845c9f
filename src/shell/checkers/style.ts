// CHANGE: Style checker adapter (pycodestyle over the whole snapshot)
// PURITY: SHELL
// EFFECT: Effect<CheckOutcome, ExternalToolError, ProcessRunner>
// INVARIANT: Exactly one invocation, rooted at the snapshot; pass ⇔ violations = 0
// COMPLEXITY: O(n) where n = output length

import { Effect } from "effect";

import { combineOutput, relativizeOutput } from "../../core/command.js";
import { ExternalToolError } from "../../core/errors.js";
import { type CheckOutcome, WELL_KNOWN_FILES } from "../../core/models.js";
import { parseViolationCount } from "../../core/score.js";
import { resolveOptionalConfig } from "../config/loader.js";
import type { ProcessRunner } from "../utils/exec.js";
import {
	type CheckerContext,
	invokeChecker,
	reproductionCommand,
} from "./invoke.js";

/**
 * Runs the style engine over the full snapshot tree and counts violations.
 *
 * @param context Adapter context
 * @returns StyleOutcome; a non-zero exit without any parsed violation is fatal
 *
 * @pure false - executes external process
 * @invariant The reproduction command targets "." in the real tree
 */
export function runStyleCheck(
	context: CheckerContext,
): Effect.Effect<CheckOutcome, ExternalToolError, ProcessRunner> {
	return Effect.gen(function* () {
		const configPath = resolveOptionalConfig(
			context.repoRoot,
			WELL_KNOWN_FILES.styleConfig,
		);
		console.log(`🎨 Running style check on the staged tree`);
		const result = yield* invokeChecker("pycodestyle", context, [
			"--count",
			...(configPath === null ? [] : [`--config=${configPath}`]),
			context.snapshot.root,
		]);

		const violations = parseViolationCount(result.stdout, result.stderr);
		if (result.exitCode !== 0 && violations === 0) {
			return yield* Effect.fail(
				new ExternalToolError({
					tool: "pycodestyle",
					reason: `exited with status ${result.exitCode} without reporting violations: ${result.stderr.trim()}`,
				}),
			);
		}

		const outcome: CheckOutcome = {
			_tag: "StyleOutcome",
			violations,
			command: reproductionCommand(context, [
				"--count",
				...(configPath === null
					? []
					: [`--config=${WELL_KNOWN_FILES.styleConfig}`]),
				".",
			]),
			output: relativizeOutput(
				combineOutput(result.stdout, result.stderr),
				context.snapshot.root,
			),
		};
		return outcome;
	});
}
