import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Suppress stdout from passing tests
    silent: process.env.VERBOSE_TESTS === 'true' ? false : 'passed-only',
    // Hide skipped tests unless verbose mode
    hideSkippedTests: process.env.VERBOSE_TESTS !== 'true',
    environment: 'node',
    // git-backed tests spawn real processes
    testTimeout: 15000,
    coverage: {
      reporter: ['text', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.config.*',
        'tests/**'
      ]
    },
    include: [
      'tests/**/*.{test,spec}.ts'
    ]
  }
});
