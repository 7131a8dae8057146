import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin/task-cli.ts', 'src/bin/github-activity.ts'],
  outDir: 'dist/bin',
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  splitting: true,
  // both entries already start with a shebang, which esbuild keeps
});
