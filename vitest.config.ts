import { defineConfig } from 'vitest/config';

/**
 * Default Vitest configuration for all tests
 * Runs both unit tests and e2e session flow tests
 */
export default defineConfig({
  test: {
    // Set NODE_ENV for tests
    env: {
      NODE_ENV: 'test',
    },

    // Use Node environment for server-side testing
    environment: 'node',

    // Test file patterns - all tests
    include: ['tests/unit/**/*.test.ts', 'tests/e2e/**/*.spec.ts'],

    // Auth flows go through two local HTTP servers
    testTimeout: 30000,

    // Hook timeout for fake provider startup/teardown
    hookTimeout: 15000,

    sequence: {
      concurrent: false,
    },

    // Starts the fake identity provider for e2e flows
    setupFiles: ['tests/e2e/session/helpers/setup.ts'],

    // Pool configuration - use forks for better isolation
    pool: 'forks',
  },
});
