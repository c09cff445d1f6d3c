import { defineConfig } from 'tsup';

// Library entry and CLI binary share one bundle; the shebang in src/index.ts is kept
export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  target: 'node20',
  platform: 'node',
  outDir: 'dist'
});
