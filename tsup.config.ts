import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/cli/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist/bundle',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // The entry keeps its own #! line, so no banner here.
    // pino loads its transports by path at run time
    external: ['pino', 'pino-pretty'],
});
