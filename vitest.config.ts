import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@lanwarden/gateway/testing': path.resolve(rootDir, 'packages/gateway/src/testing/index.ts'),
      '@lanwarden/gateway': path.resolve(rootDir, 'packages/gateway/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    isolate: true,
    setupFiles: ['./vitest.global.setup.ts'],
    testTimeout: 15_000,
    hookTimeout: 30_000,
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'services/**/src/tests/unit/**/*.test.ts',
      'services/**/src/tests/integration/**/*.test.ts'
    ],
    exclude: ['**/node_modules/**', '**/dist/**']
  }
});
