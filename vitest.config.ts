import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Both workspaces run from the root in one pass
    include: ['broker-rpc-ts/tests/**/*.test.ts', 'adapter-cli-ts/tests/**/*.test.ts'],

    watch: false,
    testTimeout: 10000,
  },
});
