import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      '@keymark/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@keymark/react': fileURLToPath(new URL('./packages/react/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.{ts,tsx}'],
    environment: 'node',
    environmentMatchGlobs: [['packages/react/**', 'jsdom']],
    setupFiles: ['./packages/react/tests/setup.ts'],
  },
});
