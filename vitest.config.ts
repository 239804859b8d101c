import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// Enable Vitest's built-in globals API (describe, it, expect), no need for manual import
		globals: true,
		// Test environment, use 'node' for backend projects
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
});
