import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Keep the logger quiet and off the filesystem while tests run
    env: {
      LOG_SILENT: '1',
      LOG_FILE: '',
      LOG_STDERR: '0',
    },
    testTimeout: 10000,
  },
});
