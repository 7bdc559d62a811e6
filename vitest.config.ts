import { defineConfig } from 'vitest/config';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@nex/core': resolve(rootDir, 'packages/core/src/index.ts'),
      '@nex/engine': resolve(rootDir, 'packages/engine/src/index.ts'),
      '@nex/assets': resolve(rootDir, 'packages/assets/src/index.ts'),
      '@nex/game-logic': resolve(rootDir, 'packages/game-logic/src/index.ts'),
      '@nex/audio': resolve(rootDir, 'packages/audio/src/index.ts'),
      '@nex/input': resolve(rootDir, 'packages/input/src/index.ts'),
      '@nex/renderer': resolve(rootDir, 'packages/renderer/src/index.ts'),
      '@nex/app': resolve(rootDir, 'packages/app/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tools/*/src/**/*.test.ts'],
  },
});
