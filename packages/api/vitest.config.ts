import { defineConfig } from 'vitest/config'
import path from 'path'
import { fileURLToPath } from 'url'

const here = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: [
      { find: /^@cabdesk\/domain$/, replacement: path.resolve(here, '../domain/src/index.ts') },
      { find: /^@cabdesk\/domain\/testing$/, replacement: path.resolve(here, '../domain/src/testing/index.ts') },
    ],
  },
})
