import { defineConfig } from 'tsup';

export default defineConfig({
  // ESM and CJS builds (external firebase)
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  dts: true,
  clean: true,
  sourcemap: true,
  minify: false,
  target: 'es2022',
  outDir: 'dist/bundle',
  external: ['firebase', 'firebase/app', 'firebase/auth'],
});
