import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // run against the kernel sources; the package's default export is the build
    alias: {
      '@voxmesh/kernel': fileURLToPath(new URL('./packages/voxel-kernel/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
