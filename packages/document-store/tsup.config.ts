import { defineConfig } from '@reportrag/tsup-config';

export default defineConfig();
