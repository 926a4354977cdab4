// CHANGE: Vitest configuration for status-tree
// WHY: Native ESM, explicit imports, deterministic isolated tests
// PURITY: SHELL (configuration only)
// INVARIANT: Tests never spawn git; the producer is injected
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Strict coverage for CORE, lenient for SHELL/APP/BIN
		// WHY: CORE is pure and fully reachable from unit tests
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
			},
		},

		// Prevent test contamination between cases
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
