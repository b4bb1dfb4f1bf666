// Vitest configuration for mailquery.
// Tests live beside the sources as *.test.ts.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
  },
})
