// biome-ignore lint/correctness/noUndeclaredDependencies: vitest is declared at the workspace root
import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: [
			// One project per package: segments, chain
			'packages/*/vitest.config.ts',
		],
	},
})
