// CHANGE: Console reporting for verdicts and the final gate line
// PURITY: SHELL (console output); formatters are pure
// INVARIANT: Each failing checker prints self-contained blocks before the summary line
// COMPLEXITY: O(n) where n = total remediation output length

import type { CheckVerdict, RemediationBlock } from "../../core/models.js";
import { CHECKER_LABELS } from "../../core/verdict.js";

export const SUMMARY_PASSED = "✅ Commit gate: looks good";
export const SUMMARY_FAILED = "❌ Commit gate: failed";
export const SKIP_MESSAGE =
	"ℹ️  No Python or script changes staged; skipping checks.";

/**
 * Lines of one remediation block.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatRemediation({ headline: "Lint score: pkg rated 7.5/10 (threshold 10/10)", command: "pylint pkg", output: "" });
 * // ["❌ Lint score: pkg rated 7.5/10 (threshold 10/10)", "   ↳ Reproduce: pylint pkg"]
 * ```
 */
export function formatRemediation(block: RemediationBlock): readonly string[] {
	const lines = [`❌ ${block.headline}`, `   ↳ Reproduce: ${block.command}`];
	if (block.output.trim().length > 0) {
		lines.push(block.output.trimEnd());
	}
	return lines;
}

/**
 * @pure true
 */
export function formatVerdict(verdict: CheckVerdict): readonly string[] {
	if (verdict.passed) {
		return [`✅ ${CHECKER_LABELS[verdict.checker]} passed`];
	}
	return verdict.remediations.flatMap((block) => [
		...formatRemediation(block),
		"",
	]);
}

/**
 * Prints a verdict as soon as its checker finishes.
 *
 * @pure false (console output)
 */
export function printVerdict(verdict: CheckVerdict): void {
	const lines = formatVerdict(verdict);
	if (verdict.passed) {
		for (const line of lines) console.log(line);
		return;
	}
	for (const line of lines) console.error(line);
}

/**
 * @pure false (console output)
 */
export function printSummary(passed: boolean): void {
	console.log(passed ? SUMMARY_PASSED : SUMMARY_FAILED);
}
