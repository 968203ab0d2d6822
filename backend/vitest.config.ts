import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // Each spec file boots and migrates its own in-process Postgres.
    hookTimeout: 30_000,
    testTimeout: 15_000,
  },
});
