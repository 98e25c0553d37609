import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['agent-tail-core/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
