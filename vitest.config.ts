import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@synaptic/shared': packageSource('shared'),
      '@synaptic/models': packageSource('models'),
      '@synaptic/store': packageSource('store'),
      '@synaptic/core': packageSource('core'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
