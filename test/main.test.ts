// CHANGE: Tests for the programmatic command entry
// INVARIANT: Returns an exit code as a value; infrastructure errors stay in the error channel

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CLIOptions } from "../src/core/models.js";
import { runCommand } from "../src/main.js";
import { USAGE } from "../src/shell/config/cli.js";
import { ProcessRunnerLive } from "../src/shell/utils/exec.js";
import { createTempRepo, type TempRepo } from "./utils/tempRepo.js";

const NO_FLAGS: CLIOptions = { force: false, installHook: false, help: false };

let repo: TempRepo;

beforeEach(() => {
	repo = createTempRepo();
	vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
	repo.cleanup();
});

const run = (options: CLIOptions) =>
	Effect.runPromise(
		Effect.either(
			runCommand(options, repo.cwd).pipe(Effect.provide(ProcessRunnerLive)),
		),
	);

describe("runCommand", () => {
	it("prints usage for --help", async () => {
		const result = await run({ ...NO_FLAGS, help: true });
		expect(result).toEqual(Either.right(0));
		expect(console.log).toHaveBeenCalledWith(USAGE);
	});

	it("installs the hook for --install-hook", async () => {
		const result = await run({ ...NO_FLAGS, installHook: true });
		expect(result).toEqual(Either.right(0));
		expect(
			fs.existsSync(path.join(repo.cwd, ".git", "hooks", "pre-commit")),
		).toBe(true);
	});

	it("exits 0 when nothing is staged", async () => {
		expect(await run(NO_FLAGS)).toEqual(Either.right(0));
	});

	it("surfaces an invalid configuration as ConfigError", async () => {
		repo.write("commit-gate.config.json", '{ "tools": [] }');
		const result = await run(NO_FLAGS);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left).toMatchObject({
				_tag: "Config",
				detail: "tools must be an object",
			});
		}
	});
});
