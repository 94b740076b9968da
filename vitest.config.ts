// CHANGE: Vitest configuration for the guidelint test suite
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Full coverage for CORE, baseline for SHELL/APP
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: lines(f) ≥ 90%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 85,
					functions: 90,
					lines: 90,
					statements: 90,
				},
			},
		},

		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
