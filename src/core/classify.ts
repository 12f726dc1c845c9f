// CHANGE: Pure file classification predicates and target routing
// PURITY: CORE
// INVARIANT: Each predicate is independent; existence is decided by the SHELL and passed in
// COMPLEXITY: O(n) per list operation where n = |paths|

const PYTHON_EXTENSION = ".py";
const SCRIPT_EXTENSION = ".js";
const SHEBANG_MARKER = "#!";
const PYTHON_INTERPRETER = "python";

/**
 * Normalizes an ignore-list entry to a repository-relative prefix: forward
 * slashes, no leading "./" or "/".
 *
 * @pure true
 * @example normalizeRepoPath("/vendor/") === "vendor/"
 */
export function normalizeRepoPath(input: string): string {
	return input.replace(/\\/g, "/").replace(/^(?:\.?\/)+/u, "");
}

/**
 * @pure true
 * @invariant hasPythonExtension(p) ⇔ p ends with ".py"
 */
export function hasPythonExtension(filePath: string): boolean {
	return filePath.endsWith(PYTHON_EXTENSION);
}

/**
 * Detects an interpreter directive naming python.
 *
 * @param firstLine First line of the file, null when unreadable
 * @pure true
 *
 * @example
 * ```ts
 * isPythonShebang("#!/usr/bin/env python3"); // true
 * isPythonShebang("#!/bin/sh"); // false
 * ```
 */
export function isPythonShebang(firstLine: string | null): boolean {
	if (firstLine === null) return false;
	return (
		firstLine.includes(SHEBANG_MARKER) && firstLine.includes(PYTHON_INTERPRETER)
	);
}

/**
 * @pure true
 */
export function hasScriptExtension(filePath: string): boolean {
	return filePath.endsWith(SCRIPT_EXTENSION);
}

/**
 * Parses ignore-list file content into path prefixes.
 *
 * Blank lines and `#` comments are dropped; entries lose a leading "./" or "/".
 *
 * @pure true
 * @complexity O(n) where n = content length
 */
export function parseIgnoreList(content: string): readonly string[] {
	return content
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"))
		.map(normalizeRepoPath)
		.filter((line) => line.length > 0);
}

/**
 * @pure true
 * @invariant matchesIgnorePrefix(p, []) = false
 */
export function matchesIgnorePrefix(
	filePath: string,
	ignoreList: readonly string[],
): boolean {
	return ignoreList.some((prefix) => filePath.startsWith(prefix));
}

/**
 * Python-source decision for a path whose existence is already known.
 *
 * @pure true
 */
export function isPythonSource(
	filePath: string,
	exists: boolean,
	firstLine: string | null,
): boolean {
	if (!exists) return false;
	return hasPythonExtension(filePath) || isPythonShebang(firstLine);
}

/**
 * Script-source decision for a path whose existence is already known.
 *
 * @pure true
 */
export function isScriptSource(
	filePath: string,
	exists: boolean,
	ignoreList: readonly string[],
): boolean {
	return (
		exists &&
		hasScriptExtension(filePath) &&
		!matchesIgnorePrefix(filePath, ignoreList)
	);
}

/**
 * Removes duplicates while keeping first-seen order.
 *
 * @pure true
 * @invariant ∀i<j: result[i] first appears before result[j] in input
 * @complexity O(n)
 */
export function uniqueInOrder(paths: readonly string[]): readonly string[] {
	const seen = new Set<string>();
	const result: string[] = [];
	for (const entry of paths) {
		if (seen.has(entry)) continue;
		seen.add(entry);
		result.push(entry);
	}
	return result;
}

/**
 * Splits NUL-delimited git output (`-z`) into unique paths.
 *
 * @pure true
 * @invariant entries are kept byte-exact (spaces and backslashes are legal in names)
 */
export function parseGitPathList(raw: string): readonly string[] {
	return uniqueInOrder(raw.split("\u0000").filter((entry) => entry.length > 0));
}

/**
 * @pure true
 * @example topLevelSegment("pkg/sub/mod.py") === "pkg"
 */
export function topLevelSegment(filePath: string): string {
	const [head] = filePath.split("/");
	return head ?? filePath;
}

/**
 * Lint targets: every module, then each python file not inside one of them.
 *
 * @param modules Top-level module directories
 * @param pythonFiles Changed python-source files
 * @returns Modules followed by loose files, duplicate-free
 *
 * @pure true
 * @complexity O(m + n)
 */
export function selectLintTargets(
	modules: readonly string[],
	pythonFiles: readonly string[],
): readonly string[] {
	const moduleSet = new Set(modules);
	const loose = pythonFiles.filter(
		(file) => !moduleSet.has(topLevelSegment(file)),
	);
	return uniqueInOrder([...modules, ...loose]);
}
