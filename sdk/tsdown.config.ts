import { defineConfig } from 'tsdown'

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  target: 'es2022',

  dts: true,
  sourcemap: true,
  clean: true,

  treeshake: true,
  minify: false,

  platform: 'node'
})
