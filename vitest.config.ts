import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		// PGlite boots a full Postgres per test file
		testTimeout: 20000,
		hookTimeout: 20000,
	},
});
