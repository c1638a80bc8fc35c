import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their sources, so tests need no bundle first.
const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^framespec-runner$/, replacement: source('./packages/framespec-runner/src/index.ts') },
			{ find: /^framespec$/, replacement: source('./packages/framespec/src/index.ts') },
		],
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
	},
});
