// CHANGE: Unit tests for report parsing
// INVARIANT: Missing rating ⇒ null ⇒ pass; only the maximum score passes

import { describe, expect, it } from "vitest";

import {
	lintTargetPasses,
	parseLintRating,
	parseViolationCount,
} from "../../src/core/score.js";

describe("parseLintRating", () => {
	it("reads a perfect score", () => {
		expect(
			parseLintRating(
				"--------\nYour code has been rated at 10.00/10\n",
			),
		).toBe(10);
	});

	it("reads the current score when a previous run is mentioned", () => {
		expect(
			parseLintRating(
				"Your code has been rated at 9.50/10 (previous run: 10.00/10, -0.50)",
			),
		).toBe(9.5);
	});

	it("reads negative scores", () => {
		expect(parseLintRating("Your code has been rated at -2.50/10")).toBe(-2.5);
	});

	it("returns null when the report has no rating statement", () => {
		expect(parseLintRating("")).toBeNull();
		expect(parseLintRating("************* Module pkg\n")).toBeNull();
	});
});

describe("lintTargetPasses", () => {
	it("passes when no rating was produced", () => {
		expect(lintTargetPasses(null)).toBe(true);
	});

	it("passes at exactly the maximum score", () => {
		expect(lintTargetPasses(10)).toBe(true);
	});

	it("fails below the maximum score", () => {
		expect(lintTargetPasses(9.99)).toBe(false);
		expect(lintTargetPasses(0)).toBe(false);
	});
});

describe("parseViolationCount", () => {
	it("prefers the total printed on stderr", () => {
		expect(
			parseViolationCount(
				"a.py:1:1: E101 indentation contains mixed spaces and tabs\nb.py:2:3: W291 trailing whitespace\n",
				"2\n",
			),
		).toBe(2);
	});

	it("counts report lines when stderr carries no total", () => {
		expect(
			parseViolationCount("a.py:1:80: E501 line too long (81 > 79 characters)\n", ""),
		).toBe(1);
		expect(
			parseViolationCount(
				"a.py:1:80: E501 line too long (81 > 79 characters)\n",
				"warning: something odd\n",
			),
		).toBe(1);
	});

	it("returns zero for a clean run", () => {
		expect(parseViolationCount("", "")).toBe(0);
	});
});
