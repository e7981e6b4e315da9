import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@streamnorm/shared': path.resolve(__dirname, 'packages/shared/src'),
      '@streamnorm/stream-core': path.resolve(__dirname, 'packages/stream-core/src'),
      '@streamnorm/llm-client': path.resolve(__dirname, 'packages/llm-client/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
