import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/**/test/**/*.spec.ts',
      'apps/**/test/**/*.spec.ts'
    ],
    reporters: ['default'],
    hookTimeout: 30000,
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'packages/**/src/**/*.ts',
        'apps/**/src/**/*.ts'
      ],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.spec.ts'
      ]
    }
  }
});
