import { defineConfig } from 'vitest/config';
import swc from 'unplugin-swc';
import * as path from 'path';

// SWC instead of esbuild so NestJS providers get decorator metadata
export default defineConfig({
  plugins: [swc.vite({ module: { type: 'es6' } })],
  resolve: {
    alias: {
      '@tabula/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
  },
});
