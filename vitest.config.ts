import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger',
      'packages/shared',
      'packages/pdf-parser',
      'packages/document-store',
      'packages/vector-store',
      'packages/report-processor',
    ],
  },
});
