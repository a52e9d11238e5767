import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts', 'packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@colloquy/types': fromRoot('./packages/types/src/index.ts'),
      '@colloquy/core': fromRoot('./packages/core/src/index.ts'),
      '@colloquy/services': fromRoot('./packages/services/src/index.ts'),
      '@colloquy/runtime': fromRoot('./packages/runtime/src/index.ts'),
      '@colloquy/persistence': fromRoot('./packages/persistence/src/index.ts'),
    },
  },
});
