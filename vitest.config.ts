import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Integration tests (*.int.test.ts) skip themselves without AWS_ENDPOINT_URL
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**'],
  },
});
