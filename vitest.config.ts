import { createRequire } from 'node:module';
import { defineConfig } from 'vitest/config';

const require = createRequire(import.meta.url);

export default defineConfig({
  resolve: {
    // Load ws through its CommonJS entry, as the compiled (CommonJS) build does;
    // its ESM wrapper's default export lacks WebSocket.Server.
    alias: {
      ws: require.resolve('ws'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 10_000,
  },
});
