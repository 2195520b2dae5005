import path from 'node:path';
import swc from 'unplugin-swc';
import { defineConfig, type UserConfig } from 'vitest/config';

// Decorator metadata is required by Nest's injector; esbuild drops it, swc keeps it.
export const globalConfig = {
  plugins: [swc.vite()],
  resolve: {
    alias: {
      '@token-proxy/logger': path.resolve(__dirname, './packages/logger/src/index.ts'),
      '@token-proxy/up': path.resolve(__dirname, './packages/up/src/index.ts'),
      '@token-proxy/utils': path.resolve(__dirname, './packages/utils/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    exclude: ['node_modules', 'dist'],
    testTimeout: 10_000,
  },
} satisfies UserConfig;

export default defineConfig(globalConfig);
