import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    watch: false,
    environment: 'node',
    reporters: ['default'],
    include: ['tests/**/*.test.ts'],
    globals: true,
    logHeapUsage: true,
    silent: false,
    testTimeout: 5000,
    hookTimeout: 2000
  }
});
