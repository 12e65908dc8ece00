import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts', 'src/cli.ts'],
    format: ['cjs', 'esm'],
    dts: { entry: 'src/index.ts' },
    clean: true,
    sourcemap: true,
    minify: false,
    platform: 'node',
    target: 'node20',
    // Don't bundle dependencies - let consumers install them
    external: [
        'cheerio',
        'commander',
        'zod'
    ],
});
