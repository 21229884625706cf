import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@actor-timelines/engine': resolve(rootDir, 'packages/engine/src/index.ts'),
      '@actor-timelines/timeline': resolve(rootDir, 'packages/timeline/src/index.ts'),
      '@actor-timelines/level-data': resolve(rootDir, 'packages/level-data/src/index.ts'),
      '@actor-timelines/game-logic': resolve(rootDir, 'packages/game-logic/src/index.ts'),
    },
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tools/*/src/**/*.test.ts'],
  },
});
