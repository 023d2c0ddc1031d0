import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts', 'src/oidc/index.ts', 'src/jwt/index.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
})
