import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: ['packages/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],

    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: true,        // Reset mocks between tests
    restoreMocks: true,     // Restore original implementations
    clearMocks: true,       // Clear mock history

    watch: false,
    retry: 0,
  },
});
