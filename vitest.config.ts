import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['Shared', 'Fusion-MCP'],
  },
});
