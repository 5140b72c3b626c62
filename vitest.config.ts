import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // Exclude compiled tests to prevent double execution
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'dist/**',
        '**/*.config.ts',
        '**/*.test.ts',
        'tests/helpers/**', // Exclude test utilities from coverage
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
        // Admission decisions and ban bookkeeping
        'src/core/rule-evaluator.ts': {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
        'src/bans/offense-tracker.ts': {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
    },
  },
});
