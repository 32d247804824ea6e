import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.test.ts',
        '**/__testUtils__/**',
        '**/types.ts',
        '**/index.ts',
      ],
    },
    // Rate limiter and retry tests run on a virtual clock; nothing here should be slow
    testTimeout: 10000,
  },
});
