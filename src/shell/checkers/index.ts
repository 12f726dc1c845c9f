// CHANGE: Central export for checker adapters

export type { CheckerContext } from "./invoke.js";
export { invokeChecker, reproductionCommand } from "./invoke.js";
export { listModules, runLintScore } from "./lint.js";
export { runScriptLint } from "./script.js";
export { runStyleCheck } from "./style.js";
