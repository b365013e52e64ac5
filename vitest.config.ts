import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@beatgrid/system': new URL('./packages/system/src/index.ts', import.meta.url).pathname,
      '@beatgrid/engine': new URL('./packages/engine/src/index.ts', import.meta.url).pathname,
    },
  },
})
