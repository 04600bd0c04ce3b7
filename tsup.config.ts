import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'docker/server': 'docker/server.ts',
  },
  format: ['esm'],
  platform: 'node',
  dts: false,
  splitting: false,
  sourcemap: true,
  clean: true,
  minify: false,
  target: 'node20',
  outDir: 'dist',
  external: ['hono', '@hono/node-server', 'neverthrow', 'unzipit'],
});
