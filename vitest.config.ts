import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Enable global test APIs like describe, it, expect
    globals: true,
    include: ['**/*.spec.ts'],
    // Silence the console logger while tests run
    setupFiles: ['./vitest.setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/**', 'dist/**', 'main.ts', 'cli.ts'],
    },
    environment: 'node',
  },
})
