import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Mapping functions are parsed from their source; keep `??` and arrows intact.
  // `undefined` still comes out as `void 0`.
  esbuild: {
    target: 'es2022'
  },
  test: {
    include: ['src/**/tests/**/*.test.ts'],
    environment: 'node'
  }
});
