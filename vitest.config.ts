import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['circuit-ops/src/**/*.test.ts', 'circuit-dag/src/**/*.test.ts'],
  },
})
