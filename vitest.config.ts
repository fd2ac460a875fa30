import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		environment: "node",
		// config tests chdir, which worker threads do not allow
		pool: "forks",
		include: ["src/**/*.test.ts"],
		// PGlite boots a WASM Postgres per test file
		testTimeout: 30000,
		hookTimeout: 30000,
	},
})
