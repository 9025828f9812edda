import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 is a native add-on; forks avoid loading it in worker threads
    pool: 'forks',
  },
})
