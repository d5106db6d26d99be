import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'Shared/tests/**/*.test.ts',
      'Snippets-MCP/tests/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 20_000,
    // Engine tests spawn child processes; keep files sequential so timing assertions stay stable
    fileParallelism: false,
  },
});
