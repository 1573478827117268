import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["ruleway/tests/**/*.test.ts"],
		environment: "node",
	},
});
