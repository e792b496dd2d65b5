import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: '@dfa-algebra/core',
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
})
