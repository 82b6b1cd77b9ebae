import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@eink-composer/types': path.resolve(__dirname, 'packages/types/src/index.ts'),
      '@eink-composer/core': path.resolve(__dirname, 'packages/core/src/index.ts'),
      '@eink-composer/render': path.resolve(__dirname, 'packages/render/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/**/index.ts'],
    },
  },
});
