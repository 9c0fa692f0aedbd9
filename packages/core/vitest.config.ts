import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    name: 'core',
    environment: 'node',
    include: [
      'src/**/*.test.ts',
      'src/**/__tests__/**/*.test.ts',
      'test/**/*.spec.ts',
    ],
    // Configuration for property-based testing with fast-check
    testTimeout: 10000,
    env: {
      FC_NUM_RUNS: process.env.CI === 'true' ? '1000' : '100',
    },
  },
});
