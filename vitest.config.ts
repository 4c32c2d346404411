import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Disable watch mode by default - prevents hanging in CI/automated runs
    watch: false,

    testTimeout: 30000,
    hookTimeout: 10000,

    // Tests share process-wide console spies
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true
      }
    },

    clearMocks: true,
    restoreMocks: true,

    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', '.git'],

    environment: 'node',
    globals: true,

    // Enabled by `npm run test:coverage`
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      thresholds: {
        lines: 80,
        functions: 75,
        branches: 70,
        statements: 80
      }
    }
  }
})
