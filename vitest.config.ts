import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@frostbridge/core': pkg('core'),
      '@frostbridge/sql': pkg('sql'),
      '@frostbridge/session': pkg('session'),
      '@frostbridge/typemap': pkg('typemap'),
      '@frostbridge/catalog': pkg('catalog'),
      '@frostbridge/rewriter': pkg('rewriter'),
      '@frostbridge/shaper': pkg('shaper'),
      '@frostbridge/metadata': pkg('metadata')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/**/test/**/*.spec.ts',
      'apps/**/test/**/*.spec.ts',
      'tests/**/*.spec.ts'
    ],
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'packages/**/src/**/*.ts',
        'apps/**/src/**/*.ts'
      ],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.spec.ts'
      ]
    }
  }
});
