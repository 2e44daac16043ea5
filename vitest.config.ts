import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    isolate: true,
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 30000,
    // Keep pino quiet unless a test opts in
    env: {
      LOG_LEVEL: 'silent',
    },
    setupFiles: ['tests/helpers/test-setup.ts'],
  }
});
