import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'docbridge',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 10_000,
  },
})
