import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',
    // Child processes, so stubbed HOME reaches os.homedir()
    pool: 'forks',
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],

      // Service layer only; commands and TUI screens are exercised manually
      include: ['src/lib/**/*.ts', 'src/utils/**/*.ts'],

      exclude: [
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
        '**/tests/**',
      ],

      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
    },

    // Mock configuration
    clearMocks: true,

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
