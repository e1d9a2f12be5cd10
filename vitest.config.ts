import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const workspaces = ['core', 'listeners', 'content', 'tls', 'site', 'server'];

export default defineConfig({
  resolve: {
    // Workspace packages export their TypeScript sources to the tests, not dist/
    alias: Object.fromEntries(
      workspaces.map((name) => [
        `@snowweb/${name}`,
        fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
      ])
    ),
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
