import { defineConfig } from "tsup";

export default defineConfig({
	entry: { cli: "packages/cli/src/cli.ts" },
	format: ["esm"],
	target: "node20",
	outDir: "dist",
	clean: true,
	sourcemap: true,
});
