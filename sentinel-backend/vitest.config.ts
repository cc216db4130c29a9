import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
    // Tests never touch the on-disk database or start the loop on import
    env: {
      NODE_ENV: 'test',
      DB_PATH: ':memory:',
      AUTO_REMEDIATION: 'false',
      COMPUTE_BACKEND: 'simulation',
    },
  },
});
