import { defineConfig } from 'tsup';

const version = process.env.npm_package_version ?? 'dev';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist/bundle',
  clean: true,
  sourcemap: true,
  // Ships resources/cbdep.config beside the bundled script
  publicDir: 'resources',
  define: {
    __VERSION__: JSON.stringify(version),
    __BUNDLED__: 'true',
  },
});
