// CHANGE: Lint scorer adapter (pylint per module and per loose file)
// FORMAT THEOREM: ∀t ∈ targets: pass(t) ⇔ rating(t) = null ∨ rating(t) ≥ 10
// PURITY: SHELL
// EFFECT: Effect<CheckOutcome, ExternalToolError | FSError, ProcessRunner>
// INVARIANT: Targets are scored sequentially, each against its snapshot copy
// COMPLEXITY: O(t) invocations where t = |modules| + |loose files|

import { Effect } from "effect";

import { selectLintTargets } from "../../core/classify.js";
import { combineOutput, relativizeOutput } from "../../core/command.js";
import { ExternalToolError, FSError } from "../../core/errors.js";
import {
	type CheckOutcome,
	type LintTargetResult,
	MODULE_MARKER,
	WELL_KNOWN_FILES,
} from "../../core/models.js";
import { parseLintRating } from "../../core/score.js";
import { resolveOptionalConfig } from "../config/loader.js";
import type { ProcessRunner } from "../utils/exec.js";
import { fs, path } from "../utils/node-mods.js";
import {
	type CheckerContext,
	invokeChecker,
	reproductionCommand,
} from "./invoke.js";

/**
 * Exit status bit pylint sets for a usage error.
 */
const PYLINT_USAGE_ERROR = 32;

/**
 * Top-level snapshot directories that carry the module marker, sorted.
 *
 * @param snapshotRoot Absolute snapshot directory
 * @effect Effect<readonly string[], FSError>
 */
export function listModules(
	snapshotRoot: string,
): Effect.Effect<readonly string[], FSError> {
	return Effect.try({
		try: () =>
			fs
				.readdirSync(snapshotRoot, { withFileTypes: true })
				.filter(
					(entry) =>
						entry.isDirectory() &&
						fs.existsSync(path.join(snapshotRoot, entry.name, MODULE_MARKER)),
				)
				.map((entry) => entry.name)
				.sort(),
		catch: (error) =>
			new FSError({ detail: String(error), path: snapshotRoot }),
	});
}

function scoreTarget(
	context: CheckerContext,
	target: string,
	rcfile: string | null,
): Effect.Effect<LintTargetResult, ExternalToolError, ProcessRunner> {
	return Effect.gen(function* () {
		console.log(`📏 Scoring ${target}`);
		const result = yield* invokeChecker("pylint", context, [
			...(rcfile === null ? [] : [`--rcfile=${rcfile}`]),
			path.join(context.snapshot.root, target),
		]);
		if ((result.exitCode & PYLINT_USAGE_ERROR) !== 0) {
			return yield* Effect.fail(
				new ExternalToolError({
					tool: "pylint",
					reason: `usage error while scoring ${target}: ${result.stderr.trim()}`,
				}),
			);
		}
		const report = relativizeOutput(
			combineOutput(result.stdout, result.stderr),
			context.snapshot.root,
		);
		return {
			target,
			rating: parseLintRating(result.stdout),
			command: reproductionCommand(context, [
				...(rcfile === null ? [] : [`--rcfile=${WELL_KNOWN_FILES.lintConfig}`]),
				target,
			]),
			report,
		};
	});
}

/**
 * Scores every module of the snapshot plus each changed python file outside them.
 *
 * @param context Adapter context
 * @param pythonFiles Changed python-source files (repository-relative)
 * @returns LintOutcome with one entry per target, in routing order
 *
 * @pure false - executes external processes
 * @invariant A target without a rating statement is recorded with rating = null
 */
export function runLintScore(
	context: CheckerContext,
	pythonFiles: readonly string[],
): Effect.Effect<CheckOutcome, ExternalToolError | FSError, ProcessRunner> {
	return Effect.gen(function* () {
		const modules = yield* listModules(context.snapshot.root);
		const targets = selectLintTargets(modules, pythonFiles);
		const rcfile = resolveOptionalConfig(
			context.repoRoot,
			WELL_KNOWN_FILES.lintConfig,
		);
		const results = yield* Effect.forEach(targets, (target) =>
			scoreTarget(context, target, rcfile),
		);
		const outcome: CheckOutcome = { _tag: "LintOutcome", targets: results };
		return outcome;
	});
}
