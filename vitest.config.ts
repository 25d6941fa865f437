import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@modpath/core': packageSource('core'),
      '@modpath/game-path': packageSource('game-path'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    pool: 'forks',
    poolOptions: {
      // The leak-sweep tests drive collection through global.gc.
      forks: { execArgv: ['--expose-gc'] },
    },
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts'],
    },
  },
});
