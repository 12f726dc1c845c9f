// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect programs
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Gate orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { DEFAULT_GATE_CONFIG, ProcessRunnerLive, runGate } from "commit-gate";
 *
 * const result = await Effect.runPromise(
 *   runGate({ repoRoot: "/path/to/repo", force: false, config: DEFAULT_GATE_CONFIG }).pipe(
 *     Effect.provide(ProcessRunnerLive),
 *   ),
 * );
 * if (result.passed) {
 *   console.log("✅ ready to commit");
 * }
 * ```
 */
export { runGate } from "./app/runGate.js";
export { main, runCommand } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CheckerName,
	CheckOutcome,
	CheckVerdict,
	CLIOptions,
	ExitCode,
	GateConfig,
	GateOptions,
	GateResult,
	LintTargetResult,
	RemediationBlock,
	ToolCommand,
} from "./core/models.js";
export {
	DEFAULT_GATE_CONFIG,
	LINT_THRESHOLD,
	WELL_KNOWN_FILES,
} from "./core/models.js";
export {
	type AppError,
	ConfigError,
	describeAppError,
	ExecError,
	ExternalToolError,
	FSError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	isPythonShebang,
	isPythonSource,
	isScriptSource,
	matchesIgnorePrefix,
	parseIgnoreList,
	selectLintTargets,
} from "./core/classify.js";
export { allPassed, computeExitCode } from "./core/decision.js";
export { lintTargetPasses, parseLintRating } from "./core/score.js";
export { normalizeOutcome } from "./core/verdict.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type ProcessRequest,
	type ProcessResult,
	ProcessRunner,
	ProcessRunnerLive,
} from "./shell/utils/exec.js";
