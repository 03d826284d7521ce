import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['bot/src/**/*.test.ts'],
		environment: 'node',
	},
});
