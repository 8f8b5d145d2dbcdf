import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    server: 'src/server.ts'
  },
  format: ['esm'],
  target: 'node20',
  clean: true,
  sourcemap: true,
  splitting: false,
  bundle: true
})
