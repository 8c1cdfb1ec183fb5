/**
 * @fileoverview Vitest configuration for every workspace
 *
 * @description
 * One `vitest run` at the root covers the API, the dashboard client and the
 * shared packages. Tests live in `__tests__` folders beside the code.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    restoreMocks: true,
  },
})
