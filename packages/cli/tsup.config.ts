import { defineConfig } from 'tsup'

export default defineConfig([
  // CLI build
  {
    name: 'cli',
    entry: ['src/cli.ts'],
    format: ['esm'],
    platform: 'node',
    target: 'node20',
    // ワークスペースのライブラリは TypeScript ソースのまま公開しているので同梱する
    noExternal: ['@texpack/texture-atlas'],
    splitting: false,
    sourcemap: true,
    clean: true,
    minify: false,
    outDir: 'dist',
  },
])
