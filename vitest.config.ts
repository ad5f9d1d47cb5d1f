import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'shared/src/**/*.test.ts',
      'daemon/src/**/*.test.ts',
      'cli/src/**/*.test.ts',
      'tests/integration/**/*.test.ts',
    ],
    testTimeout: 30000,
    hookTimeout: 30000,
    globals: false,
    environment: 'node',
  },
});
