import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@forcegate/core": `${packages}/core/src/index.ts`,
			"@forcegate/connector-salesforce": `${packages}/connector-salesforce/src/index.ts`,
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
	},
});
