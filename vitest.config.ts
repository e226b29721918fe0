import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests run against sources
      '@hawk-auth/core': workspace('./packages/hawk-core/src/index.ts'),
      '@hawk-auth/server': workspace('./packages/hawk-server/src/index.ts'),
      '@hawk-auth/client': workspace('./packages/hawk-client/src/index.ts'),
      '@hawk-auth/middleware-express': workspace(
        './packages/middleware-express/src/index.ts'
      ),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    bail: process.env.CI ? 1 : 0,
  },
});
