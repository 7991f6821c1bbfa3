import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		include: ['tests/**/*.{test,spec}.ts', 'src/**/*.{test,spec}.ts'],
		setupFiles: ['./tests/setup.ts'],
		env: {
			DATABASE_PATH: ':memory:',
			LOG_LEVEL: 'error',
			LOG_TO_FILE: 'false',
			BOT_TOKEN: 'test-bot-token',
			OWNER_ID: '1000',
		},
		coverage: {
			provider: 'v8',
			reporter: ['text', 'lcov', 'html'],
			include: ['src/**/*.ts'],
			exclude: [
				'src/**/*.d.ts',
				'src/**/*.test.ts',
				'src/**/*.spec.ts',
				'src/bot.ts'
			]
		},
		// Run tests serially; each file still gets its own in-memory database
		pool: 'forks',
		poolOptions: {
			forks: {
				singleFork: true
			}
		}
	}
});
