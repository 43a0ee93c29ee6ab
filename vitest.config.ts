import path from "node:path";
import { defineConfig } from "vitest/config";

const pkg = (name: string, dir = `packages/${name}`): [string, string] => [
	`@quantscripts/${name}`,
	path.resolve(__dirname, dir, "src/index.ts"),
];

export default defineConfig({
	resolve: {
		alias: Object.fromEntries([
			pkg("core"),
			pkg("indicators"),
			pkg("data"),
			pkg("runtime"),
		]),
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
