import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.{ts,tsx}'],
    exclude: ['node_modules', 'dist'],
    restoreMocks: true,
  },
});
