import type { Options } from 'tsup';

/**
 * Shared tsup build options. Workspace packages are bundled into each build
 * since their manifests point at TypeScript sources. Packages that depend on
 * ESM-only libraries override `format` with `['esm']`.
 */
export const defineConfig = (options: Options = {}): Options => {
  return {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    target: 'node20',
    noExternal: [/^@reportrag\//],
    ...options,
  };
};
