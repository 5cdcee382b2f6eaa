/**
 * @file packages/core/vitest.config.ts
 * @description Vitest configuration for the core package.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // tsyringe needs the Reflect polyfill before any decorated class loads.
    setupFiles: ['reflect-metadata'],
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
