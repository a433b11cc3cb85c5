import { defineConfig } from 'tsup';

export default defineConfig({
  splitting: true,
  sourcemap: true,
  clean: true,
  dts: true,
  format: ['cjs', 'esm'],
  minify: false,
  bundle: true,
  skipNodeModulesBundle: true,
  entry: ['src/index.ts'],
  outDir: 'dist',
  watch: false,
  target: 'node20',
  treeshake: true,
});
