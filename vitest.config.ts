import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Keeps config/env.js from exiting when a test forgets to mock it.
    env: {
      STORE_MODE: 'memory',
      NODE_ENV: 'test',
    },
  },
});
