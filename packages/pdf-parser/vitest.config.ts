import { defineConfig as defineBaseConfig } from '@reportrag/vitest-config';
import { defineConfig } from 'vitest/config';

export default defineConfig(defineBaseConfig());
