import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],

      include: ['src/lib/**/*.ts'],

      exclude: [
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
        '**/tests/**',
      ],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,

        'src/lib/validation-service.ts': {
          lines: 95,
          functions: 95,
          branches: 95,
          statements: 95,
        },
      },
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
