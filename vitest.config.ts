import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    reporters: ['default'],
    exclude: ['node_modules/**', 'dist/**', '**/.{tmp,temp}/**', '**/.tmp/**']
  }
})
