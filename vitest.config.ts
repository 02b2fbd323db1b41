import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from './vitest.base.js';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    include: ['Shared/tests/**/*.test.ts', 'Sandbox-MCP/tests/**/*.test.ts'],
    // Orchestrator tests measure wall-clock timeouts
    fileParallelism: false,
  },
}));
