import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bbo-plugin/contracts': src('solver-contracts'),
      '@bbo-plugin/protocol': src('solver-protocol'),
      '@bbo-plugin/runtime': src('solver-runtime'),
      '@bbo-plugin/testing': src('solver-testing'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
  },
});
