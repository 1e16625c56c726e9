import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@velvetqueue/shared': fromRoot('./packages/shared/src')
    }
  },
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts', 'services/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    sequence: {
      seed: 12345
    }
  }
});
