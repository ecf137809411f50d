import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		watch: false,
		globals: true,
		environment: 'node',
		includeSource: ['src/**/*.ts'],
	},
});
