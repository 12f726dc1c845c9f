// CHANGE: Tests for the style checker adapter
// INVARIANT: One invocation over the snapshot root; pass ⇔ violations = 0

import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runStyleCheck } from "../../../src/shell/checkers/style.js";
import {
	type CheckerFixture,
	createCheckerFixture,
	DEFAULT_TOOLS,
} from "../../utils/builders.js";
import { makeScriptedRunner, processResult } from "../../utils/scriptedRunner.js";

let fixture: CheckerFixture;

beforeEach(() => {
	fixture = createCheckerFixture();
	vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
	fixture.cleanup();
});

describe("runStyleCheck", () => {
	it("reports zero violations for a clean tree", async () => {
		const runner = makeScriptedRunner({ pycodestyle: () => processResult() });

		const outcome = await Effect.runPromise(
			runStyleCheck(fixture.context(DEFAULT_TOOLS.style)).pipe(
				Effect.provide(runner.layer),
			),
		);

		expect(outcome).toEqual({
			_tag: "StyleOutcome",
			violations: 0,
			command: "pycodestyle --count .",
			output: "",
		});
		expect(runner.calls).toEqual([
			{
				command: "pycodestyle",
				args: ["--count", fixture.snapshot.cwd],
				cwd: fixture.snapshot.cwd,
			},
		]);
	});

	it("passes the repository config and relativizes the report", async () => {
		fixture.repo.write(".pycodestyle", "[pycodestyle]\nmax-line-length = 100\n");
		const violation = `${path.join(fixture.snapshot.cwd, "pkg", "a.py")}:1:1: E101 indentation contains mixed spaces and tabs\n`;
		const runner = makeScriptedRunner({
			pycodestyle: () =>
				processResult({ exitCode: 1, stdout: violation, stderr: "1\n" }),
		});

		const outcome = await Effect.runPromise(
			runStyleCheck(fixture.context(DEFAULT_TOOLS.style)).pipe(
				Effect.provide(runner.layer),
			),
		);

		expect(runner.calls[0]?.args).toEqual([
			"--count",
			`--config=${path.join(fixture.repo.cwd, ".pycodestyle")}`,
			fixture.snapshot.cwd,
		]);
		expect(outcome).toEqual({
			_tag: "StyleOutcome",
			violations: 1,
			command: "pycodestyle --count --config=.pycodestyle .",
			output: "pkg/a.py:1:1: E101 indentation contains mixed spaces and tabs\n1",
		});
	});

	it("prefixes the configured tool arguments", async () => {
		const runner = makeScriptedRunner({ python3: () => processResult() });

		const outcome = await Effect.runPromise(
			runStyleCheck(
				fixture.context({ command: "python3", args: ["-m", "pycodestyle"] }),
			).pipe(Effect.provide(runner.layer)),
		);

		expect(runner.calls[0]?.args).toEqual([
			"-m",
			"pycodestyle",
			"--count",
			fixture.snapshot.cwd,
		]);
		expect(outcome).toMatchObject({
			command: "python3 -m pycodestyle --count .",
		});
	});

	it("treats a failing exit without violations as fatal", async () => {
		const runner = makeScriptedRunner({
			pycodestyle: () =>
				processResult({ exitCode: 2, stderr: "usage: pycodestyle\n" }),
		});

		const result = await Effect.runPromise(
			Effect.either(
				runStyleCheck(fixture.context(DEFAULT_TOOLS.style)).pipe(
					Effect.provide(runner.layer),
				),
			),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.tool).toBe("pycodestyle");
			expect(result.left.reason).toBe(
				"exited with status 2 without reporting violations: usage: pycodestyle",
			);
		}
	});

	it("fails when the engine cannot be started", async () => {
		const runner = makeScriptedRunner();

		const result = await Effect.runPromise(
			Effect.either(
				runStyleCheck(fixture.context(DEFAULT_TOOLS.style)).pipe(
					Effect.provide(runner.layer),
				),
			),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe(
				"failed to run pycodestyle: spawn pycodestyle ENOENT",
			);
		}
	});
});
