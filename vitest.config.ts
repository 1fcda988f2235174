import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Step commands spawn real shells
    pool: 'forks',
    testTimeout: 30_000,
    include: ['tests/**/*.test.ts'],
  },
});
