import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveFromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    setupFiles: ['__tests__/_setup.ts'],
    include: ['__tests__/**/*.test.ts'],
    forceRerunTriggers: ['**/vitest.config.*/**', '**/__mocks__/**/*', '__tests__/_setup.ts'],
    alias: {
      '@/tests/': resolveFromRoot('./__tests__/'),
      '@/mocks/': resolveFromRoot('./__mocks__/'),
      '@/': resolveFromRoot('./src/'),
    },
  },
});
