import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // esbuild (Vite's default transform) renames decorated classes whose
  // static members reference them; SWC lowers legacy decorators like tsc.
  plugins: [
    swc.vite({
      jsc: {
        target: 'es2022',
        parser: { syntax: 'typescript', decorators: true },
        transform: { legacyDecorator: true, decoratorMetadata: false, useDefineForClassFields: true },
      },
    }),
  ],
  esbuild: false,
  test: {
    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      exclude: ['tests/**', 'benchmarks/**', '**/*.test.ts', 'vitest.config.ts', '**/*.d.ts'],
      include: ['src/**/*.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
  },
});
