import { defineConfig } from 'tsup'

export default defineConfig([
  // Main library entry
  {
    entry: ['src/index.ts'],
    target: 'node20',
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    splitting: false,
    treeshake: true,
    outDir: 'dist',
  },
  // CLI entry, invoked from crontab (ESM only for bin)
  {
    entry: ['src/cli.ts'],
    target: 'node20',
    format: ['esm'],
    dts: false,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
])
