import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        testTimeout: 30000,
        include: ['spec/**/*.test.ts'],
    },
    resolve: {
        alias: {
            '@src': fileURLToPath(new URL('./src', import.meta.url)),
            '@spec': fileURLToPath(new URL('./spec', import.meta.url)),
        },
    },
});
