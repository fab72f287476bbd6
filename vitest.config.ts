import path from 'path'
import { fileURLToPath } from 'url'
import { defineConfig } from 'vitest/config'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    alias: {
      '@domain': path.resolve(rootDir, 'src/domain'),
      '@application': path.resolve(rootDir, 'src/application'),
      '@infrastructure': path.resolve(rootDir, 'src/infrastructure'),
    },
  },
})
