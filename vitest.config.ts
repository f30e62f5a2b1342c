import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file runs in its own worker
    isolate: true,
    pool: 'threads',

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
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        '**/index.ts',
        '**/types.ts',
        'tools/compost-sim/cli.ts',
        'coverage/**',
        'dist/**',
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
    // Mirrors the "paths" block in tsconfig.json
    alias: {
      '$types': fromRoot('./src/types'),
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@events': fromRoot('./src/events'),
      '@features': fromRoot('./src/features'),
      '@logging': fromRoot('./src/logging'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
    },
  },
})
