/**
 * Vitest Configuration
 *
 * SCOPE: Unit tests only. Every test works on a temporary data root under
 * the OS temp directory; nothing touches the network or a real git checkout.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cupsmith',
    include: ['src/__tests__/unit/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    // Test execution
    pool: 'forks',
    isolate: true,

    testTimeout: 5_000,
    hookTimeout: 5_000,

    environment: 'node',
    retry: 0,
  },
});
