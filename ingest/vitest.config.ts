import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      include: ['src/normalizer/**', 'src/reader/**'],
      exclude: ['src/**/*.test.ts'],
    },
  },
});
