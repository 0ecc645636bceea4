import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    testTimeout: 5000,
    hookTimeout: 5000,
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    env: {
      NODE_ENV: 'test',
      // Keep the console quiet; tests that care about logging set their own level
      MCP_PROXY_CLIENT_LOG_LEVEL: 'error',
      MCP_PROXY_CLIENT_LOG_TARGET: 'console',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'src/types/',
        'src/cli.ts',
        'test/',
      ],
    },
  },
});
