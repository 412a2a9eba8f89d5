import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // One graphql build for both the sources and mercurius, which requires it
    alias: [{ find: /^graphql$/, replacement: 'graphql/index.js' }],
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
