import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        include: ['engine/**/*.test.ts', 'server/**/*.test.ts'],
    },
    resolve: {
        alias: {
            '@engine': fileURLToPath(new URL('./engine', import.meta.url)),
        },
    },
});
