import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		include: ['*.test.ts', 'align-lyrics/**/*.test.ts'],
		environment: 'node',
	},
})
