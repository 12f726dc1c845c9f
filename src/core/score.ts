// CHANGE: Parsers for checker reports (rating, violation count)
// FORMAT THEOREM: parseLintRating(r) = x ⇔ r contains "rated at x/10"
// PURITY: CORE
// INVARIANT: Absent statements map to null / structural fallback, never throw
// COMPLEXITY: O(n) where n = report length

import { LINT_THRESHOLD } from "./models.js";

const RATING_PATTERN = /rated at (-?\d+(?:\.\d+)?)\/10/u;
const VIOLATION_LINE_PATTERN = /^.+:\d+:\d+: \S/u;
const COUNT_LINE_PATTERN = /^\d+$/u;

/**
 * Extracts the rating from a lint report.
 *
 * @returns Rating, or null when the report has no rating statement
 * @pure true
 *
 * @example
 * ```ts
 * parseLintRating("Your code has been rated at 9.50/10 (previous run: 9.00/10)"); // 9.5
 * parseLintRating(""); // null
 * ```
 */
export function parseLintRating(report: string): number | null {
	const found = RATING_PATTERN.exec(report);
	if (found === null) return null;
	const value = Number.parseFloat(found[1] ?? "");
	return Number.isNaN(value) ? null : value;
}

/**
 * @pure true
 * @invariant result ⇔ (rating === null ∨ rating >= LINT_THRESHOLD)
 */
export function lintTargetPasses(rating: number | null): boolean {
	return rating === null || rating >= LINT_THRESHOLD;
}

function nonEmptyLines(text: string): readonly string[] {
	return text
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

/**
 * Total style violations from a `--count` run.
 *
 * Prefers the total printed as the last stderr line; otherwise counts
 * `path:line:col: message` lines on stdout.
 *
 * @pure true
 * @invariant result >= 0
 */
export function parseViolationCount(stdout: string, stderr: string): number {
	const last = nonEmptyLines(stderr).at(-1);
	if (last !== undefined && COUNT_LINE_PATTERN.test(last)) {
		return Number.parseInt(last, 10);
	}
	return nonEmptyLines(stdout).filter((line) =>
		VIOLATION_LINE_PATTERN.test(line),
	).length;
}
