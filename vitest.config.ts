import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/test/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		setupFiles: ["./vitest.setup.ts"],
		testTimeout: 30000,
	},
	resolve: {
		alias: {
			"@registrar/core": pkg("core"),
			"@registrar/roster": pkg("roster"),
			"@registrar/ui": pkg("ui"),
			"@registrar/cli": pkg("cli"),
		},
	},
});
