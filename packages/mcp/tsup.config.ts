import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  // Workspace packages are TypeScript sources; bundle them into the bin.
  noExternal: [/^@switchboard\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
