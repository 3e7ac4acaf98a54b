import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  // Workspace packages point at TypeScript sources; inline them.
  noExternal: [/^@vigil\//],
});
