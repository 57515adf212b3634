import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: true,
		environment: "node",
		testTimeout: 30000,
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary"],
			reportsDirectory: "./coverage",
			exclude: [
				"**/*.test.ts",
				"**/node_modules/**",
				"**/dist/**",
				// Barrel index files (re-exports only)
				"**/packages/*/src/index.ts",
				"**/packages/*/src/*/index.ts",
				// Type-only files
				"**/packages/logger/src/types.ts",
				"**/packages/space/src/types.ts",
			],
		},
	},
});
