import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function source(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    // Workspace packages are tested from source, not from dist
    alias: {
      '@pylayer/utils': source('./packages/utils/src/index.ts'),
      '@pylayer/core': source('./packages/core/src/index.ts'),
      '@pylayer/layer': source('./packages/layer/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});
