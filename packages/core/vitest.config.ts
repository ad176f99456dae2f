import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    // Disable file watching by default
    watch: false,
    // Set reasonable timeouts
    testTimeout: 10000,
    hookTimeout: 10000,
    // Clear mocks between tests
    clearMocks: true,
    isolate: true,
    reporters: ['default'],
  },
});
