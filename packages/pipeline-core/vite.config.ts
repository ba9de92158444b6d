import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

export default defineConfig({
  // Error names are printed and reported, so minification must not rename classes.
  esbuild: {
    keepNames: true,
  },
  build: {
    target: 'node20',
    sourcemap: true,
    lib: {
      entry: 'src/index.ts',
      formats: ['es'],
      fileName: 'index',
    },
    rollupOptions: {
      external: [...builtinModules, /^node:/, /^yaml$/],
    },
  },
})
