import { defineConfig, type PluginOption } from 'vite';
import { visualizer } from 'rollup-plugin-visualizer';

export default defineConfig({
    base: './',
    plugins: [
        process.env.ANALYZE
            ? (visualizer({
                template: 'raw-data',
                filename: 'dist/bundle-stats.json',
                gzipSize: true,
                brotliSize: true,
            }) as PluginOption)
            : null,
    ],
    build: {
        outDir: 'dist/bundle',
        emptyOutDir: true,
        target: 'es2018',
        sourcemap: true,
        lib: {
            entry: 'src/index.ts',
            name: 'Storyreel',
            formats: ['es', 'umd'],
            fileName: (format) => `storyreel.${format}.js`,
        },
    },
});
