import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "cli",
		include: ["test/**/*.test.{ts,tsx}"],
		environment: "node",
		globals: true,
		setupFiles: ["./test/setup.ts"],
	},
	resolve: {
		// Load @treeloom/core from its TypeScript sources
		conditions: ["source"],
	},
	esbuild: {
		jsx: "automatic",
		jsxImportSource: "react",
	},
});
