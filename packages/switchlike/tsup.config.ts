import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (everything)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    dispatch: 'src/dispatch-entry.ts',
    predicates: 'src/predicates-entry.ts',
    errors: 'src/errors-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
