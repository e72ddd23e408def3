import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts', 'src/index.ts'],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    setupFiles: ['tests/setup.ts'],
    retry: process.env.CI ? 2 : 0,
  },
});
