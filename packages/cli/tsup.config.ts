import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  noExternal: [/^@switchboard\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
