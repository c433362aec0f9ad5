import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    // Tests send SIGINT to their worker, which must be a process of its own
    pool: 'forks',
    include: ['test/**/*.test.ts'],
    testTimeout: 10000,
  },
})
