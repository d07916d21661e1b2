// CHANGE: Vitest configuration for the option core and the supervisor shell
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: independent of other tests' mocks and of a real lrun install
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// Supervisor tests spawn a stand-in shell script per case.
		testTimeout: 20_000,

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
