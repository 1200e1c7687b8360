import { defineConfig } from 'vitest/config';
import * as path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

const packages = [
  'auth', 'client', 'crypto', 'identity', 'marketplace', 'protocol',
  'reputation', 'server', 'signing', 'store', 'types',
];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@soulrelay/${pkg}`] = path.resolve(root, `packages/${pkg}/src/index.ts`);
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
  },
});
