import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  resolve: {
    alias: {
      '@pagewright/core': source('core'),
      '@pagewright/react': source('react'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.{ts,tsx}'],
  },
});
