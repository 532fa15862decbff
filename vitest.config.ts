import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@sastweave/core': pkg('core'),
      '@sastweave/engines': pkg('engines'),
      '@sastweave/reachability': pkg('reachability'),
      '@sastweave/verify': pkg('verify'),
      '@sastweave/sarif': pkg('sarif'),
      '@sastweave/cli': pkg('cli'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
