import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'tests', 'dist', '**/*.d.ts', '**/*.test.ts'],
      include: ['src/**/*.ts'],
    },
    testTimeout: 10000,
  },
});
