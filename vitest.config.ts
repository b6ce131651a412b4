import path from 'path'

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // CRITICAL: Enable proper isolation for mock cleanup
    isolate: true,              // Each test file in separate worker
    pool: 'threads',            // Use worker threads for isolation

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts', 'tools/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/index.ts',
        'tools/ph-cli/cli.ts',
        'test/**',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '$types': path.resolve(__dirname, './src/types'),
      '@boot': path.resolve(__dirname, './src/boot'),
      '@core': path.resolve(__dirname, './src/core'),
      '@hardware': path.resolve(__dirname, './src/hardware'),
      '@logging': path.resolve(__dirname, './src/logging'),
      '@storage': path.resolve(__dirname, './src/storage'),
      '@utils': path.resolve(__dirname, './src/utils'),
      '@validation': path.resolve(__dirname, './src/validation'),
      '$test-utils': path.resolve(__dirname, './test'),
    },
  },
})
