import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts", "controller/src/**/*.test.ts"],
		restoreMocks: true,
		clearMocks: true
	},
	resolve: {
		alias: {
			// Tests run against workspace sources, no build needed
			"@regen-controller/common": path.resolve(__dirname, "packages/common/src/index.ts")
		}
	}
});
