import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    include: [
      'packages/**/src/**/*.{test,spec}.ts',
      'examples/dev-server/src/tests/**/*.{test,spec}.ts',
    ],
    environment: 'node',
    globals: true,          // allows describe/it without importing
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
  resolve: {
    // exact matches, so @parcelwatch/core/testing is not rewritten through the core entry
    alias: [
      { find: /^@parcelwatch\/core$/, replacement: fromRoot('./packages/core/src/index.ts') },
      { find: /^@parcelwatch\/core\/testing$/, replacement: fromRoot('./packages/core/src/__tests__/fakes.ts') },
      { find: /^@parcelwatch\/adapters-17track$/, replacement: fromRoot('./packages/adapters/17track/src/index.ts') },
      { find: /^@parcelwatch\/store-sqlite$/, replacement: fromRoot('./packages/store-sqlite/src/index.ts') },
    ],
  },
});
