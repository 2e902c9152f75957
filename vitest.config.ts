import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    resolve: {
        alias: {
            '@shared': fileURLToPath(new URL('./packages/shared', import.meta.url))
        }
    },

    test: {
        include: ['packages/tests/**/*.test.ts'],
        environment: 'node',
        globals: true
    }
});
