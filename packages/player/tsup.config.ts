import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  target: 'node20',
  outDir: 'dist',
  treeshake: true,
  // Runtime dependencies stay external; pino loads its transports by name.
  external: ['pino', 'pino-pretty', 'p-queue', 'zod'],
});
