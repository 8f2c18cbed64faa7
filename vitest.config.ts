import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts', 'modules/providers/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
});
