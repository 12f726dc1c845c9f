#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { describeAppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import { main } from "../main.js";
import { ProcessRunnerLive } from "../shell/utils/exec.js";

const program = main().pipe(
	Effect.provide(ProcessRunnerLive),
	Effect.catchAll((error) =>
		Effect.sync((): ExitCode => {
			console.error(`💥 Fatal error: ${describeAppError(error)}`);
			return 1;
		}),
	),
);

void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(program);
		process.exit(code);
	} catch (error) {
		// Defects (bugs, failed snapshot removal) end up here
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
