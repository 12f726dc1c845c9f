// CHANGE: Tests for the process runner
// INVARIANT: Non-zero exit ⇒ result; spawn failure ⇒ ExecError

import * as os from "node:os";

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	execProcess,
	ProcessRunnerLive,
	runProcess,
} from "../../../src/shell/utils/exec.js";

describe("runProcess", () => {
	it("captures stdout of a successful process", async () => {
		const result = await Effect.runPromise(
			runProcess({ command: "git", args: ["--version"], cwd: os.tmpdir() }),
		);
		expect(result.exitCode).toBe(0);
		expect(result.stdout.startsWith("git version")).toBe(true);
	});

	it("returns a non-zero exit status as a result", async () => {
		const result = await Effect.runPromise(
			runProcess({
				command: "git",
				args: ["definitely-not-a-subcommand"],
				cwd: os.tmpdir(),
			}),
		);
		expect(result.exitCode).not.toBe(0);
		expect(result.stderr.length).toBeGreaterThan(0);
	});

	it("fails with ExecError when the executable is missing", async () => {
		const result = await Effect.runPromise(
			Effect.either(
				runProcess({
					command: "commit-gate-missing-binary",
					args: ["--flag"],
					cwd: os.tmpdir(),
				}),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("Exec");
			expect(result.left.command).toBe("commit-gate-missing-binary --flag");
		}
	});
});

describe("execProcess", () => {
	it("runs through the provided ProcessRunner", async () => {
		const result = await Effect.runPromise(
			execProcess({ command: "git", args: ["--version"], cwd: os.tmpdir() }).pipe(
				Effect.provide(ProcessRunnerLive),
			),
		);
		expect(result.exitCode).toBe(0);
	});
});
