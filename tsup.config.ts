import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		index: "packages/connector-salesforce/src/index.ts",
	},
	format: ["esm"],
	target: "node20",
	sourcemap: true,
	clean: true,
	outDir: "dist",
});
