import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const harnessDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  root: resolve(harnessDir, '..', '..'),
  resolve: {
    alias: {
      '@keyprompt/core': resolve(harnessDir, '../core/src/index.ts'),
      '@keyprompt/platform': resolve(harnessDir, '../platform/src/index.ts'),
      '@keyprompt/platform-macos': resolve(harnessDir, '../platform-macos/src/index.ts'),
      '@keyprompt/platform-windows': resolve(harnessDir, '../platform-windows/src/index.ts'),
    },
  },
  test: {
    include: ['packages/test-harness/src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      all: true,
      include: [
        'packages/core/src/**/*.ts',
        'packages/platform/src/**/*.ts',
        'apps/agent/src/main/**/*.ts',
      ],
    },
  },
});
