import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['videogen-worker/src/**/*.test.ts', 'videogen-starter/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000
  }
});
