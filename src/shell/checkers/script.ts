// CHANGE: Script linter adapter (jshint over changed script files)
// PURITY: SHELL
// EFFECT: Effect<CheckOutcome, ExternalToolError, ProcessRunner>
// INVARIANT: |files| = 0 ⇒ no invocation; |files| > 0 ⇒ exactly one invocation
// COMPLEXITY: O(n) where n = |files|

import { Effect } from "effect";

import { combineOutput, relativizeOutput } from "../../core/command.js";
import type { ExternalToolError } from "../../core/errors.js";
import { type CheckOutcome, WELL_KNOWN_FILES } from "../../core/models.js";
import { resolveOptionalConfig } from "../config/loader.js";
import type { ProcessRunner } from "../utils/exec.js";
import { path } from "../utils/node-mods.js";
import {
	type CheckerContext,
	invokeChecker,
	reproductionCommand,
} from "./invoke.js";

/**
 * Lints the changed script files in one invocation; exit status decides.
 *
 * @param context Adapter context
 * @param files Script-source files (repository-relative)
 * @returns ScriptOutcome; exitCode is null when nothing was invoked
 */
export function runScriptLint(
	context: CheckerContext,
	files: readonly string[],
): Effect.Effect<CheckOutcome, ExternalToolError, ProcessRunner> {
	return Effect.gen(function* () {
		const configPath = resolveOptionalConfig(
			context.repoRoot,
			WELL_KNOWN_FILES.scriptConfig,
		);
		const command = reproductionCommand(context, [
			...(configPath === null
				? []
				: ["--config", WELL_KNOWN_FILES.scriptConfig]),
			...files,
		]);

		if (files.length === 0) {
			console.log(`📜 No script files to lint`);
			const skipped: CheckOutcome = {
				_tag: "ScriptOutcome",
				files,
				exitCode: null,
				command,
				output: "",
			};
			return skipped;
		}

		console.log(`📜 Linting ${files.length} script file(s)`);
		const result = yield* invokeChecker("jshint", context, [
			...(configPath === null ? [] : ["--config", configPath]),
			...files.map((file) => path.join(context.snapshot.root, file)),
		]);
		const outcome: CheckOutcome = {
			_tag: "ScriptOutcome",
			files,
			exitCode: result.exitCode,
			command,
			output: relativizeOutput(
				combineOutput(result.stdout, result.stderr),
				context.snapshot.root,
			),
		};
		return outcome;
	});
}
