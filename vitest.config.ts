/**
 * Vitest config for dualpath (Node.js environment)
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['core/**/*.test.ts', 'cli/**/*.test.ts', 'utils/**/*.test.ts', 'test/**/*.test.ts'],
    environment: 'node',
  },
})
