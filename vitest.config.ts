import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tubeqa/core': pkg('core'),
      '@tubeqa/fallback': pkg('fallback'),
      '@tubeqa/transcript': pkg('transcript'),
      '@tubeqa/memory': pkg('memory'),
      '@tubeqa/qa': pkg('qa'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    // Each project names its own files; a root include would be merged into both.
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    hookTimeout: 30000,
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['test/unit/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'e2e',
          include: ['test/e2e/**/*.test.ts'],
          testTimeout: 60000,
        },
      },
    ],
  },
});
