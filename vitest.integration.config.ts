import { defineConfig } from 'vitest/config';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/integration/**/*.integration.test.ts'],
    testTimeout: 30_000,
  },
  resolve: {
    alias: {
      '@eligibility-ledger/core': resolve(rootDir, 'packages/core/src/index.ts'),
      '@eligibility-ledger/api': resolve(rootDir, 'packages/api/src/server.ts'),
    },
  },
});
