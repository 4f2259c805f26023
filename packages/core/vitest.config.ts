/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns - look in test directory
    include: ['test/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    environment: 'node',
    testTimeout: 30000,
    globals: true,
  },
});
