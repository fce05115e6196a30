import { defineConfig } from '@reportrag/tsup-config';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  // pdfjs-dist, pulled in through the bundled pdf-parser, ships ESM only
  format: ['esm'],
});
