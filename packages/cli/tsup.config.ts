import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/wmreg.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@wmreg\//],
  external: ['commander', 'yaml', 'zod'],
});
