import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      KUBE_RESOURCE_LOG_LEVEL: 'warn',
    },
  },
});
