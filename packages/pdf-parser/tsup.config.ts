import { defineConfig } from '@reportrag/tsup-config';

export default defineConfig({
  // pdfjs-dist ships ESM only
  format: ['esm'],
});
