// CHANGE: Vitest configuration
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; tests import { describe, it, expect } from "vitest"

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// Git-backed tests spawn real git processes
		testTimeout: 20000,

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
