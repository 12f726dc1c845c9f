// CHANGE: Normalize heterogeneous checker outcomes into a common verdict
// FORMAT THEOREM: ∀o: normalizeOutcome(o).passed ⇔ normalizeOutcome(o).remediations = ∅
// PURITY: CORE
// INVARIANT: Each variant decides pass/fail from its own payload only
// COMPLEXITY: O(t) where t = lint targets

import { match } from "ts-pattern";

import type {
	CheckOutcome,
	CheckVerdict,
	CheckerName,
	LintTargetResult,
	RemediationBlock,
} from "./models.js";
import { LINT_THRESHOLD } from "./models.js";
import { lintTargetPasses } from "./score.js";

export const CHECKER_LABELS: Readonly<Record<CheckerName, string>> = {
	style: "Style check",
	lint: "Lint score",
	script: "Script lint",
};

function verdict(
	checker: CheckerName,
	remediations: readonly RemediationBlock[],
): CheckVerdict {
	return { checker, passed: remediations.length === 0, remediations };
}

function lintRemediation(result: LintTargetResult): RemediationBlock | null {
	if (lintTargetPasses(result.rating)) return null;
	return {
		headline: `${CHECKER_LABELS.lint}: ${result.target} rated ${String(result.rating)}/10 (threshold ${LINT_THRESHOLD}/10)`,
		command: result.command,
		output: result.report,
	};
}

/**
 * Turns a raw outcome into pass/fail plus remediation blocks.
 *
 * @pure true
 * @complexity O(t)
 */
export const normalizeOutcome = (outcome: CheckOutcome): CheckVerdict =>
	match(outcome)
		.with({ _tag: "StyleOutcome" }, (o) =>
			verdict(
				"style",
				o.violations === 0
					? []
					: [
							{
								headline: `${CHECKER_LABELS.style}: ${o.violations} violation(s) found`,
								command: o.command,
								output: o.output,
							},
						],
			),
		)
		.with({ _tag: "LintOutcome" }, (o) =>
			verdict(
				"lint",
				o.targets
					.map(lintRemediation)
					.filter((block): block is RemediationBlock => block !== null),
			),
		)
		.with({ _tag: "ScriptOutcome" }, (o) =>
			verdict(
				"script",
				o.exitCode === null || o.exitCode === 0
					? []
					: [
							{
								headline: `${CHECKER_LABELS.script}: ${o.files.length} file(s) checked, exit status ${o.exitCode}`,
								command: o.command,
								output: o.output,
							},
						],
			),
		)
		.exhaustive();
