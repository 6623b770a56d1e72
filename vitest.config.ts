import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const corePath = (path: string): string => fileURLToPath(new URL(`./packages/core/src/${path}`, import.meta.url))

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^@switchyard\/core\/testing$/, replacement: corePath('testing.ts') },
			{ find: /^@switchyard\/core$/, replacement: corePath('index.ts') },
			{ find: /^@\//, replacement: corePath('') },
		],
	},
	test: {
		include: ['packages/*/tests/unit/**/*.test.ts'],
		testTimeout: 10_000,
		hookTimeout: 10_000,
		pool: 'forks',
		poolOptions: {
			// Connection retention tests force a full collection
			forks: { execArgv: ['--expose-gc'] },
		},
	},
})
