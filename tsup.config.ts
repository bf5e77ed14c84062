import { defineConfig } from 'tsup';

export default defineConfig({
  // Entry points - what to build
  entry: {
    cli: 'src/cli/index.ts',      // CLI entry -> dist/cli.js
    index: 'src/index.ts',         // Library entry -> dist/index.js
  },

  // Output format - ESM for modern Node.js
  format: ['esm'],

  // Generate TypeScript declaration files
  dts: true,

  sourcemap: true,

  // Clean dist/ before each build
  clean: true,

  // Target Node.js 20
  target: 'node20',

  // Shebang so dist/cli.js runs directly
  banner: {
    js: '#!/usr/bin/env node',
  },

  // External packages (don't bundle these)
  external: [
    'commander', 'chalk', 'ora', 'zod', 'openai', 'js-tiktoken',
    'pdfjs-dist', 'mammoth', 'duck-duck-scrape', '@iarna/toml', 'dotenv',
  ],
});
