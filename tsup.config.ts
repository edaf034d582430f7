import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/roffdoc.ts', 'src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist/bundle',
  clean: true,
  splitting: false,
  sourcemap: true,
  dts: true,
});
