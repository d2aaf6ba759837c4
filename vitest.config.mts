import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages_mjs/*/tests/**/*.test.mts',
      'packages_mjs/*/src/__tests__/**/*.test.mts',
    ],
    globals: false,
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages_mjs/*/src/**/*.mts'],
    },
  },
});
