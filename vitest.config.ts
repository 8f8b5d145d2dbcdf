import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      // Rejected requests log at warn; keep test output to real failures
      LOG_LEVEL: 'error'
    }
  }
})
