import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['core/**/*.test.ts', 'core/**/*.test.tsx', 'harness/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['core/**/*.ts', 'core/**/*.tsx', 'harness/**/*.ts'],
      exclude: ['**/*.test.ts', '**/*.test.tsx', '**/index.ts', '**/__fixtures__/**'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
