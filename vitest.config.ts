import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
	resolve: {
		alias: {
			'shardline-runner': fileURLToPath(
				new URL('./packages/shardline-runner/src/index.ts', import.meta.url),
			),
		},
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
		pool: 'forks',
	},
});
