// CHANGE: Change-set discovery with memoized per-category subsets
// PURITY: SHELL
// EFFECT: Effect<ChangeSetResolver, never, ProcessRunner>
// INVARIANT: Each git query and each classification pass runs at most once per resolver
// COMPLEXITY: O(n) where n = |changed paths|

import { Effect } from "effect";

import { isPythonSource, isScriptSource } from "../../core/classify.js";
import { type ExternalToolError, FSError } from "../../core/errors.js";
import { listStagedPaths, listTrackedPaths } from "../git/repository.js";
import { loadIgnoreList } from "../config/loader.js";
import type { ProcessRunner } from "../utils/exec.js";
import { fs, path } from "../utils/node-mods.js";

const FIRST_LINE_BYTES = 512;

export interface ChangeSetResolverOptions {
	readonly repoRoot: string;
	readonly force: boolean;
}

/**
 * Lazily computed, memoized views of the pending change set.
 *
 * Every effect is cached: the first evaluation runs the query, later
 * evaluations return the stored result.
 */
export interface ChangeSetResolver {
	readonly changedFiles: Effect.Effect<
		readonly string[],
		ExternalToolError,
		ProcessRunner
	>;
	readonly pythonFiles: Effect.Effect<
		readonly string[],
		ExternalToolError | FSError,
		ProcessRunner
	>;
	readonly scriptFiles: Effect.Effect<
		readonly string[],
		ExternalToolError | FSError,
		ProcessRunner
	>;
}

/**
 * True when the path names a regular file in the working tree.
 *
 * @pure false (filesystem)
 */
export function isExistingFile(absolutePath: string): boolean {
	try {
		return fs.statSync(absolutePath).isFile();
	} catch {
		return false;
	}
}

/**
 * Reads the first line of a file (bounded read).
 *
 * @effect Effect<string, FSError>
 */
export function readFirstLine(
	absolutePath: string,
): Effect.Effect<string, FSError> {
	return Effect.try({
		try: () => {
			const buffer = Buffer.alloc(FIRST_LINE_BYTES);
			const fd = fs.openSync(absolutePath, "r");
			try {
				const bytesRead = fs.readSync(fd, buffer, 0, FIRST_LINE_BYTES, 0);
				const head = buffer.subarray(0, bytesRead).toString("utf8");
				return head.split(/\r?\n/u)[0] ?? "";
			} finally {
				fs.closeSync(fd);
			}
		},
		catch: (error) => new FSError({ detail: String(error), path: absolutePath }),
	});
}

function classifyPython(
	repoRoot: string,
	files: readonly string[],
): Effect.Effect<readonly string[], FSError> {
	return Effect.filter(files, (file) => {
		const absolute = path.join(repoRoot, file);
		const exists = isExistingFile(absolute);
		if (!exists) return Effect.succeed(false);
		if (isPythonSource(file, exists, null)) return Effect.succeed(true);
		return readFirstLine(absolute).pipe(
			Effect.map((firstLine) => isPythonSource(file, exists, firstLine)),
		);
	});
}

/**
 * Builds a resolver for one run.
 *
 * @param options Repository root and force mode
 * @returns Effect producing the resolver; nothing is queried until a view is evaluated
 *
 * @example
 * ```ts
 * const resolver = yield* makeChangeSetResolver({ repoRoot: "/repo", force: false });
 * const python = yield* resolver.pythonFiles; // runs git once
 * const again = yield* resolver.pythonFiles; // cached
 * ```
 */
export function makeChangeSetResolver(
	options: ChangeSetResolverOptions,
): Effect.Effect<ChangeSetResolver> {
	const { repoRoot, force } = options;
	return Effect.gen(function* () {
		const changedFiles = yield* Effect.cached(
			force ? listTrackedPaths(repoRoot) : listStagedPaths(repoRoot),
		);
		const pythonFiles = yield* Effect.cached(
			changedFiles.pipe(
				Effect.flatMap((files) => classifyPython(repoRoot, files)),
			),
		);
		const scriptFiles = yield* Effect.cached(
			Effect.gen(function* () {
				const files = yield* changedFiles;
				const ignoreList = yield* loadIgnoreList(repoRoot);
				return files.filter((file) =>
					isScriptSource(
						file,
						isExistingFile(path.join(repoRoot, file)),
						ignoreList,
					),
				);
			}),
		);
		return { changedFiles, pythonFiles, scriptFiles };
	});
}
