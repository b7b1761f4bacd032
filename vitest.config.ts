import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,

    // Real image encoding can be slow on first load
    testTimeout: 20000,
  },
});
