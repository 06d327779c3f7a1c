import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['exchange/src/**/*.test.ts'],
        env: {
            BONDLINE_LOG_LEVEL: 'silent',
        },
    },
});
