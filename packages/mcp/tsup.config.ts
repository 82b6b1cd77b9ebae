import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@eink-composer\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
