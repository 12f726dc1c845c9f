// CHANGE: Tests for change-set discovery and classification
// INVARIANT: Each view is computed at most once per resolver

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeChangeSetResolver } from "../../../src/shell/changeset/resolver.js";
import { makeScriptedRunner } from "../../utils/scriptedRunner.js";
import { createTempRepo, type TempRepo } from "../../utils/tempRepo.js";

let repo: TempRepo;

beforeEach(() => {
	repo = createTempRepo();
});

afterEach(() => {
	repo.cleanup();
});

function stageMixedChanges(): void {
	repo.write("tool.py", "print('tool')\n");
	repo.write("bin/runner", "#!/usr/bin/env python3\nprint('run')\n");
	repo.write("bin/deploy", "#!/bin/sh\necho deploy\n");
	repo.write("src/app.js", "var app = 1;\n");
	repo.write("vendor/lib.js", "var lib = 1;\n");
	repo.write("README.md", "# readme\n");
	repo.write("gone.py", "x = 1\n");
	repo.stage(
		"tool.py",
		"bin/runner",
		"bin/deploy",
		"src/app.js",
		"vendor/lib.js",
		"README.md",
		"gone.py",
	);
	repo.remove("gone.py");
	repo.write(".jshintignore", "vendor/\n");
}

describe("makeChangeSetResolver", () => {
	it("classifies staged files into python and script sources", async () => {
		stageMixedChanges();
		const runner = makeScriptedRunner();

		const views = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeChangeSetResolver({
					repoRoot: repo.cwd,
					force: false,
				});
				return {
					changed: yield* resolver.changedFiles,
					python: yield* resolver.pythonFiles,
					script: yield* resolver.scriptFiles,
				};
			}).pipe(Effect.provide(runner.layer)),
		);

		expect(views.changed).toEqual([
			"README.md",
			"bin/deploy",
			"bin/runner",
			"gone.py",
			"src/app.js",
			"tool.py",
			"vendor/lib.js",
		]);
		expect(views.python).toEqual(["bin/runner", "tool.py"]);
		expect(views.script).toEqual(["src/app.js"]);
	});

	it("queries git once no matter how often the views are read", async () => {
		stageMixedChanges();
		const runner = makeScriptedRunner();

		await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeChangeSetResolver({
					repoRoot: repo.cwd,
					force: false,
				});
				yield* resolver.pythonFiles;
				yield* resolver.pythonFiles;
				yield* resolver.scriptFiles;
				yield* resolver.changedFiles;
			}).pipe(Effect.provide(runner.layer)),
		);

		// HEAD probe + staged diff
		expect(runner.calls).toHaveLength(2);
		expect(runner.calls[1]?.args[0]).toBe("diff");
	});

	it("does not query git until a view is read", async () => {
		const runner = makeScriptedRunner();
		await Effect.runPromise(
			makeChangeSetResolver({ repoRoot: repo.cwd, force: false }).pipe(
				Effect.provide(runner.layer),
			),
		);
		expect(runner.calls).toHaveLength(0);
	});

	it("classifies names with leading spaces or backslashes as staged", async () => {
		repo.write(" tool.py", "print('space')\n");
		repo.write("a\\tool.py", "print('backslash')\n");
		repo.git("add", "-A");
		const runner = makeScriptedRunner();

		const views = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeChangeSetResolver({
					repoRoot: repo.cwd,
					force: false,
				});
				return {
					changed: yield* resolver.changedFiles,
					python: yield* resolver.pythonFiles,
				};
			}).pipe(Effect.provide(runner.layer)),
		);

		expect(views).toEqual({
			changed: [" tool.py", "a\\tool.py"],
			python: [" tool.py", "a\\tool.py"],
		});
	});

	it("uses every tracked file in force mode", async () => {
		repo.write("tool.py", "x = 1\n");
		repo.write("web/app.js", "var a = 1;\n");
		repo.stage("tool.py", "web/app.js");
		repo.commit("initial");
		const runner = makeScriptedRunner();

		const views = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeChangeSetResolver({
					repoRoot: repo.cwd,
					force: true,
				});
				return {
					python: yield* resolver.pythonFiles,
					script: yield* resolver.scriptFiles,
				};
			}).pipe(Effect.provide(runner.layer)),
		);

		expect(views).toEqual({ python: ["tool.py"], script: ["web/app.js"] });
		expect(runner.calls[1]?.args.slice(0, 2)).toEqual(["ls-tree", "-r"]);
	});
});
