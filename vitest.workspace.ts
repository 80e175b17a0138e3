import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  // Modules with their own vitest config
  'modules/docbridge/vitest.config.ts',
  // Default: all other test files
  {
    test: {
      name: 'packages',
      include: [
        'packages/*/src/__tests__/**/*.test.ts',
        'apps/*/src/__tests__/**/*.test.ts',
      ],
    },
  },
])
