import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from '../vitest.base.ts';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    name: 'fusion-mcp',
    // Tests point the process-wide config at their own temp directories
    fileParallelism: false,
  },
}));
