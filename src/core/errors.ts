// CHANGE: Typed infrastructure error ADT using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Tool that an infrastructure failure is attributed to.
 */
export type ToolName = "git" | "pycodestyle" | "pylint" | "jshint";

/**
 * External tool could not run, or ran and reported a usage failure.
 *
 * @pure true (Data class)
 * @invariant reason.length > 0
 */
export class ExternalToolError extends Data.TaggedError("ExternalToolError")<{
	readonly tool: ToolName;
	readonly reason: string;
}> {}

/**
 * Process could not be spawned or did not exit normally.
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation failed for a reason other than absence.
 *
 * @pure true (Data class)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Gate configuration file exists but cannot be used.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("Config")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Union type of all infrastructure errors for Effect signatures.
 *
 * Quality-check failures are not errors: they are verdicts.
 */
export type AppError = ExternalToolError | ExecError | FSError | ConfigError;

/**
 * Renders an infrastructure error as one line.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeAppError = (error: AppError): string =>
	match(error)
		.with({ _tag: "ExternalToolError" }, (e) => `${e.tool}: ${e.reason}`)
		.with({ _tag: "Exec" }, (e) => `${e.command}: ${e.detail}`)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? e.detail : `${e.path}: ${e.detail}`,
		)
		.with({ _tag: "Config" }, (e) => `${e.path}: ${e.detail}`)
		.exhaustive();
