import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@beatgrid/engine': new URL('./src/index.ts', import.meta.url).pathname,
      '@beatgrid/system': new URL('../system/src/index.ts', import.meta.url).pathname,
    },
  },
})
