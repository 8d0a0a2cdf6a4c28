import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@courtsync/resilient-fetch': path.resolve(repoRoot, 'libs/resilient-fetch/src/index.ts'),
  '@courtsync/courtlistener-client': path.resolve(repoRoot, 'libs/courtlistener-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/**/__tests__/**/*.test.ts', 'apps/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
