// CHANGE: Domain models for the commit gate (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the gate process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Identifier of a checker adapter, in execution order.
 */
export type CheckerName = "style" | "lint" | "script";

export const CHECKER_ORDER: readonly CheckerName[] = ["style", "lint", "script"];

/**
 * Maximum (and required) lint rating.
 *
 * @invariant only a perfect score passes
 */
export const LINT_THRESHOLD = 10;

/**
 * Repository-relative locations of the optional tool configuration files.
 */
export const WELL_KNOWN_FILES = {
	styleConfig: ".pycodestyle",
	lintConfig: ".pylintrc",
	scriptConfig: ".jshintrc",
	scriptIgnore: ".jshintignore",
	gateConfig: "commit-gate.config.json",
} as const;

/**
 * Marker file that turns a top-level directory into a module.
 */
export const MODULE_MARKER = "__init__.py";

/**
 * Executable plus leading arguments used to start a checker.
 *
 * @invariant command.length > 0
 */
export interface ToolCommand {
	readonly command: string;
	readonly args: readonly string[];
}

export interface GateConfig {
	readonly tools: Readonly<Record<CheckerName, ToolCommand>>;
}

export const DEFAULT_GATE_CONFIG: GateConfig = {
	tools: {
		style: { command: "pycodestyle", args: [] },
		lint: { command: "pylint", args: [] },
		script: { command: "jshint", args: [] },
	},
};

/**
 * Per-target result of the lint scorer.
 *
 * @property rating Parsed "rated at X/10" value, null when the report has none
 * @property command Reproduction command against the real tree
 */
export interface LintTargetResult {
	readonly target: string;
	readonly rating: number | null;
	readonly command: string;
	readonly report: string;
}

/**
 * Raw outcome of a checker, one variant per adapter.
 *
 * @remarks
 * - `ScriptOutcome.exitCode === null` means the engine was never invoked
 * - @invariant discriminated by `_tag`
 */
export type CheckOutcome =
	| {
			readonly _tag: "StyleOutcome";
			readonly violations: number;
			readonly command: string;
			readonly output: string;
	  }
	| {
			readonly _tag: "LintOutcome";
			readonly targets: readonly LintTargetResult[];
	  }
	| {
			readonly _tag: "ScriptOutcome";
			readonly files: readonly string[];
			readonly exitCode: number | null;
			readonly command: string;
			readonly output: string;
	  };

/**
 * Self-contained diagnostic for one failure.
 */
export interface RemediationBlock {
	readonly headline: string;
	readonly command: string;
	readonly output: string;
}

/**
 * Normalized pass/fail for a single checker.
 *
 * @invariant passed ⇔ remediations.length === 0
 */
export interface CheckVerdict {
	readonly checker: CheckerName;
	readonly passed: boolean;
	readonly remediations: readonly RemediationBlock[];
}

export type GateStatus = "skipped" | "checked";

export interface GateResult {
	readonly status: GateStatus;
	readonly passed: boolean;
	readonly verdicts: readonly CheckVerdict[];
}

/**
 * Decision state for producing the exit code.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly verdicts: readonly CheckVerdict[];
}

/**
 * Options for a single gate run.
 */
export interface GateOptions {
	readonly repoRoot: string;
	readonly force: boolean;
	readonly config: GateConfig;
}

/**
 * Parsed command-line options.
 *
 * @property force Check the whole tracked tree
 * @property installHook Install the pre-commit hook instead of checking
 * @property help Print usage and exit
 */
export interface CLIOptions {
	readonly force: boolean;
	readonly installHook: boolean;
	readonly help: boolean;
}
