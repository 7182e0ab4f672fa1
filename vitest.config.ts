import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/test-helpers.ts',
        'src/index.ts',
        'src/http-server.ts',
      ],
    },

    testTimeout: 10000,
    environment: 'node',
  },
});
