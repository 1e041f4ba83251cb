import { resolve } from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@sqlgrid/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@sqlgrid/mysql': resolve(__dirname, 'packages/mysql/src/index.ts'),
      '@sqlgrid/postgresql': resolve(__dirname, 'packages/postgresql/src/index.ts'),
      '@sqlgrid/sqlite': resolve(__dirname, 'packages/sqlite/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
});
