import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Pulumi mocks are process-global; keep each file in its own fork
    pool: 'forks',
    testTimeout: 20000,
  },
});
