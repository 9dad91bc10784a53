import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.{test,spec}.ts'],
    environment: 'node',
    globals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
  resolve: {
    alias: {
      '@rolodex/core': source('core'),
      '@rolodex/store-sqlite': source('store-sqlite'),
      '@rolodex/server': source('server'),
      '@rolodex/client': source('client'),
    },
  },
});
