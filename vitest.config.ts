import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['registry-auth/typescript/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['registry-auth/typescript/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/__mocks__/**'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
