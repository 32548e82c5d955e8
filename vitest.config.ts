import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "iterlane",
		environment: "node",
		include: ["tests/**/*.test.ts"],
	},
});
