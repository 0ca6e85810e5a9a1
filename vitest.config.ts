import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        resolve: {
          alias: {
            // The demo app imports the library by its package name.
            'fluent-search-builder': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
          },
        },
        test: {
          name: 'search-app',
          include: ['search-app/tests/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
    ],
  },
});
