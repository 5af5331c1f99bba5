import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's built-in esbuild transform forces `keepNames: false`, which lets
  // esbuild rename shadowed function expressions (`function work` -> `work2`).
  // Transform TypeScript with `keepNames` so `Function.name` matches tsc output.
  esbuild: false,
  plugins: [
    {
      name: 'esbuild-keep-names',
      async transform(code, id) {
        if (!/\.[cm]?tsx?$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, {
          target: 'es2022',
          keepNames: true,
          sourcemap: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    environment: 'node',
    globals: true,
    include: ['test/**/*.test.ts'],
  },
});
