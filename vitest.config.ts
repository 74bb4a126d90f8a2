// CHANGE: Vitest configuration for CORE/SHELL test suites
// WHY: Native ESM; tests import { describe, it, expect } explicitly
// INVARIANT: Deterministic test execution; temp directories are created and removed per test

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
			},
		},
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
