import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Engine code talks to fs, fetch and sql.js; no DOM needed
    environment: 'node',

    include: ['apps/*/src/test/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'temp'],

    testTimeout: 30000,
    hookTimeout: 30000,

    setupFiles: ['./apps/learner-sync/src/test/setup.ts'],

    env: {
      NODE_ENV: 'test',
    },
  },
});
