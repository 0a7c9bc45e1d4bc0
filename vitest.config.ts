import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const entry = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@envshift/kernel': entry('kernel'),
      '@envshift/runtime-host': entry('runtime-host'),
      '@envshift/profile-engine': entry('profile-engine'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
  },
})
