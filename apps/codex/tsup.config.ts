import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	outDir: 'dist',
	clean: true,
	sourcemap: false,
	platform: 'node',
	target: 'node20',
	external: [/^node:/],
	define: {
		'import.meta.vitest': 'undefined',
	},
});
