import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: {
      compilerOptions: {
        removeComments: true
      }
    },
    clean: true,
    splitting: false,
    treeshake: true,
    sourcemap: false,
    target: 'es2022'
  },
  {
    // Browser entry of the `tabulator` asset bundle. The stylesheet imported
    // by the client is emitted next to it as `table-component.css`.
    entry: { 'table-component': 'src/client/table-component.ts' },
    outDir: 'assets/tabulator',
    format: ['esm'],
    platform: 'browser',
    noExternal: [/.*/],
    clean: true,
    splitting: false,
    treeshake: true,
    sourcemap: false,
    target: 'es2020'
  }
]);
