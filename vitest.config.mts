import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		clearMocks: true,
		coverage: {
			all: true,
			include: ["src"],
			reporter: ["html", "lcov"],
		},
		exclude: ["node_modules", ".logs"],
		setupFiles: ["console-fail-test/setup", "src/__tests__/setup.ts"],
		disableConsoleIntercept: true,
	},
});
