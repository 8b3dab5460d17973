import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string) => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@inventory/core': fromRoot('./packages/inventory-core/src/index.ts'),
      '@inventory/test-utils': fromRoot('./packages/inventory-test-utils/src/index.ts'),
      '@inventory/ingest': fromRoot('./workers/ingest/src/lib.ts')
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'workers/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 15000
  }
});
