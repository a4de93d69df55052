import { defineConfig } from 'tsup';

export default defineConfig({
  // Entry points - what to build
  entry: {
    cli: 'src/cli/index.ts',      // CLI entry -> dist/cli.js
    index: 'src/index.ts',         // Library entry -> dist/index.js
  },

  // ESM for modern Node.js
  format: ['esm'],

  dts: true,
  sourcemap: true,
  clean: true,

  target: 'node20',

  // Read by the CLI as process.env.CLI_VERSION
  env: {
    CLI_VERSION: process.env.npm_package_version ?? '0.0.0',
  },

  // Makes dist/cli.js directly executable
  banner: {
    js: "#!/usr/bin/env node",
  },

  // Dependencies are installed via npm, not bundled
  external: [
    'commander', 'chalk', 'zod', 'dotenv', '@iarna/toml', 'fast-glob',
  ],
});
