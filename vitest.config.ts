import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

// Tests run against workspace sources; package exports point at the build output
const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ican/contracts': source('contracts'),
      '@ican/shared': source('shared'),
      '@ican/kernel': source('kernel'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
