import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Tests run against the core sources, not its build output
    alias: {
      '@ollama-rest/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'cli',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
