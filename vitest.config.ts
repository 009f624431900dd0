import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

// Workspace packages resolve to their TypeScript sources, so tests never
// need a build first.
export default defineConfig({
  resolve: {
    alias: {
      '@tapir/kernel': src('kernel'),
      '@tapir/runtime-host': src('runtime-host'),
      '@tapir/cli': src('cli'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
