import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Needs DynamoDB Local at AWS_ENDPOINT_URL; suites skip themselves otherwise
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    fileParallelism: false,
    testTimeout: 30_000,
  },
});
