import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const sharedDir = fileURLToPath(new URL('./Shared', import.meta.url));

export default defineConfig({
  resolve: {
    // Tests run against Shared sources; Node loads the compiled dist/ through the export map
    alias: [{ find: /^@fusion\/shared\/(.*)\.js$/, replacement: `${sharedDir}/$1.ts` }],
  },
  test: {
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 30000,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    sequence: {
      shuffle: false,
    },
  },
});
