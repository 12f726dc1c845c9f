// CHANGE: Configuration loading for the gate (tool overrides, ignore list, optional tool configs)
// PURITY: SHELL
// EFFECT: Effect<GateConfig, ConfigError> | Effect<readonly string[], FSError>
// INVARIANT: Absent file ⇒ default value; any other read or shape failure ⇒ typed error
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { parseIgnoreList } from "../../core/classify.js";
import { ConfigError, FSError } from "../../core/errors.js";
import {
	type CheckerName,
	DEFAULT_GATE_CONFIG,
	type GateConfig,
	type ToolCommand,
	WELL_KNOWN_FILES,
} from "../../core/models.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

function isMissingFileError(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		(error.code === "ENOENT" || error.code === "ENOTDIR")
	);
}

/**
 * Reads a UTF-8 file, mapping absence to null.
 *
 * @pure false (filesystem)
 * @effect Effect<string | null, FSError>
 */
export function readOptionalFile(
	filePath: string,
): Effect.Effect<string | null, FSError> {
	return Effect.try({
		try: () => fs.readFileSync(filePath, "utf8"),
		catch: (error) => error,
	}).pipe(
		Effect.catchAll((error) =>
			isMissingFileError(error)
				? Effect.succeed(null)
				: Effect.fail(new FSError({ detail: String(error), path: filePath })),
		),
	);
}

/**
 * Absolute path of an optional tool configuration file, null when absent.
 *
 * @param repoRoot Repository root
 * @param relative Well-known relative location
 */
export function resolveOptionalConfig(
	repoRoot: string,
	relative: string,
): string | null {
	const absolute = path.join(repoRoot, relative);
	return fs.existsSync(absolute) ? absolute : null;
}

/**
 * Script-lint ignore prefixes from `.jshintignore`; empty when the file is absent.
 */
export function loadIgnoreList(
	repoRoot: string,
): Effect.Effect<readonly string[], FSError> {
	return readOptionalFile(
		path.join(repoRoot, WELL_KNOWN_FILES.scriptIgnore),
	).pipe(
		Effect.map((content) => (content === null ? [] : parseIgnoreList(content))),
	);
}

function parseToolCommand(
	checker: CheckerName,
	value: JSONValue,
): ToolCommand | string {
	if (!isArray(value) || value.length === 0) {
		return `tools.${checker} must be a non-empty array of strings`;
	}
	const parts = value.filter(isString);
	const [command, ...args] = parts;
	if (parts.length !== value.length || command === undefined) {
		return `tools.${checker} must be a non-empty array of strings`;
	}
	if (command.trim().length === 0) {
		return `tools.${checker} has an empty executable`;
	}
	return { command, args };
}

/**
 * Validates parsed JSON against the gate configuration shape.
 *
 * @returns GateConfig, or a message describing the first problem
 * @pure true
 */
export function parseGateConfig(value: JSONValue): GateConfig | string {
	if (!isJSONObject(value)) {
		return "configuration must be a JSON object";
	}
	const tools = value["tools"];
	if (tools === undefined) {
		return DEFAULT_GATE_CONFIG;
	}
	if (!isJSONObject(tools)) {
		return "tools must be an object";
	}
	const resolved: Record<CheckerName, ToolCommand> = {
		...DEFAULT_GATE_CONFIG.tools,
	};
	for (const checker of ["style", "lint", "script"] as const) {
		const entry = tools[checker];
		if (entry === undefined) continue;
		const parsed = parseToolCommand(checker, entry);
		if (typeof parsed === "string") return parsed;
		resolved[checker] = parsed;
	}
	return { tools: resolved };
}

/**
 * Loads `commit-gate.config.json`, falling back to defaults when absent.
 *
 * @param repoRoot Repository root
 * @effect Effect<GateConfig, ConfigError>
 *
 * @example
 * ```ts
 * // commit-gate.config.json: { "tools": { "style": ["python3", "-m", "pycodestyle"] } }
 * const config = yield* loadGateConfig("/repo");
 * // config.tools.style => { command: "python3", args: ["-m", "pycodestyle"] }
 * ```
 */
export function loadGateConfig(
	repoRoot: string,
): Effect.Effect<GateConfig, ConfigError> {
	const configPath = path.join(repoRoot, WELL_KNOWN_FILES.gateConfig);
	return Effect.gen(function* () {
		const raw = yield* readOptionalFile(configPath).pipe(
			Effect.mapError(
				(error) => new ConfigError({ path: configPath, detail: error.detail }),
			),
		);
		if (raw === null) return DEFAULT_GATE_CONFIG;

		const parsed = yield* Effect.try({
			try: () => JSON.parse(raw) as JSONValue,
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: `invalid JSON: ${String(error)}`,
				}),
		});
		const config = parseGateConfig(parsed);
		if (typeof config === "string") {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: config }),
			);
		}
		return config;
	});
}
