import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    // The task API exports a combinator named `then`, which makes module
    // namespaces thenable; Vite's module runner awaits namespaces and hangs.
    // Load sources with Node's own import and the tsx loader instead.
    execArgv: ['--import', 'tsx'],
    experimental: {
      viteModuleRunner: false,
    },
    coverage: {
      reporter: ['text', 'json', 'html'],
    },
  },
})
