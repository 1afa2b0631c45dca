import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite forces esbuild's keepNames off, and esbuild renames named function
  // expressions that shadow an outer binding (`function add` -> `add2`).
  // Steps take their name from `fn.name`, so transform TypeScript with
  // keepNames enabled instead of using Vite's built-in esbuild plugin.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        if (!/\.m?ts$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, {
          loader: 'ts',
          target: 'esnext',
          keepNames: true,
          sourcemap: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],

  test: {
    globals: true,
    environment: 'node',

    include: [
      'packages/**/__tests__/**/*.test.ts',
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    pool: 'threads',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    reporters: ['default'],
    watch: false,

    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
