import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/testing/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/**/*.spec.ts',
        'src/testing/**',
        'src/types/**',
        'src/db/schema.ts',
        'src/db/migrations/**',
        'src/cli/**',
      ],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
