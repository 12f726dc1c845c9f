// CHANGE: Application layer orchestration of the commit gate
// PURITY: APP (no process.exit here)
// EFFECT: Effect<GateResult, ExternalToolError | FSError, ProcessRunner>
// INVARIANT: IDLE → SKIPPED | SNAPSHOT_READY → CHECKS_RUNNING → CLEANUP → DONE, no way back
// INVARIANT: All checkers run (no early abort); the snapshot is released on every exit path
// COMPLEXITY: O(t) checker invocations where t = 2 + |lint targets|

import { Effect } from "effect";
import { match } from "ts-pattern";

import { allPassed } from "../core/decision.js";
import type { ExternalToolError, FSError } from "../core/errors.js";
import {
	CHECKER_ORDER,
	type CheckerName,
	type CheckOutcome,
	type GateOptions,
	type GateResult,
} from "../core/models.js";
import { normalizeOutcome } from "../core/verdict.js";
import { makeChangeSetResolver } from "../shell/changeset/resolver.js";
import {
	type CheckerContext,
	runLintScore,
	runScriptLint,
	runStyleCheck,
} from "../shell/checkers/index.js";
import { type SnapshotWorkspace, withSnapshot } from "../shell/git/snapshot.js";
import {
	printSummary,
	printVerdict,
	SKIP_MESSAGE,
} from "../shell/output/printer.js";
import type { ProcessRunner } from "../shell/utils/exec.js";

interface ChangedSources {
	readonly pythonFiles: readonly string[];
	readonly scriptFiles: readonly string[];
}

function runChecker(
	checker: CheckerName,
	options: GateOptions,
	snapshot: SnapshotWorkspace,
	sources: ChangedSources,
): Effect.Effect<CheckOutcome, ExternalToolError | FSError, ProcessRunner> {
	const context = (tool: CheckerName): CheckerContext => ({
		repoRoot: options.repoRoot,
		snapshot,
		tool: options.config.tools[tool],
	});
	return match<
		CheckerName,
		Effect.Effect<CheckOutcome, ExternalToolError | FSError, ProcessRunner>
	>(checker)
		.with("style", () => runStyleCheck(context("style")))
		.with("lint", () => runLintScore(context("lint"), sources.pythonFiles))
		.with("script", () =>
			runScriptLint(context("script"), sources.scriptFiles),
		)
		.exhaustive();
}

/**
 * Runs the gate once and returns the aggregated result (no process.exit).
 *
 * @param options - Repository root, force mode and tool configuration
 * @returns Effect<GateResult, ExternalToolError | FSError, ProcessRunner>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant status = "skipped" → passed ∧ verdicts = ∅
 * @postcondition passed ⇔ ∀v ∈ verdicts: v.passed
 */
export function runGate(
	options: GateOptions,
): Effect.Effect<GateResult, ExternalToolError | FSError, ProcessRunner> {
	return Effect.gen(function* () {
		const resolver = yield* makeChangeSetResolver({
			repoRoot: options.repoRoot,
			force: options.force,
		});
		const sources: ChangedSources = {
			pythonFiles: yield* resolver.pythonFiles,
			scriptFiles: yield* resolver.scriptFiles,
		};

		if (
			!options.force &&
			sources.pythonFiles.length === 0 &&
			sources.scriptFiles.length === 0
		) {
			console.log(SKIP_MESSAGE);
			const skipped: GateResult = {
				status: "skipped",
				passed: true,
				verdicts: [],
			};
			return skipped;
		}

		console.log(
			`🔍 Checking ${sources.pythonFiles.length} Python file(s) and ${sources.scriptFiles.length} script file(s)${options.force ? " (forced)" : ""}`,
		);

		const verdicts = yield* withSnapshot(options.repoRoot, (snapshot) =>
			Effect.forEach(CHECKER_ORDER, (checker) =>
				runChecker(checker, options, snapshot, sources).pipe(
					Effect.map(normalizeOutcome),
					Effect.tap((verdict) => Effect.sync(() => printVerdict(verdict))),
				),
			),
		);

		const passed = allPassed(verdicts);
		printSummary(passed);
		const result: GateResult = { status: "checked", passed, verdicts };
		return result;
	});
}
