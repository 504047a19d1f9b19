import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/test/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/index.ts',
        'packages/*/src/replica/replica-worker.ts',
      ],
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
  esbuild: {
    target: 'node20'
  }
});
