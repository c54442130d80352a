import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: [
			"packages/*/src/**/*.test.ts",
			"apps/connectors/*/src/**/*.test.ts",
		],
		restoreMocks: true,
		testTimeout: 10000,
	},
});
