import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  // The entry's shebang is carried over to the bundle.
  noExternal: [/^@zkscore\//],
});
