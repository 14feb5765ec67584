import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        extensions: ['.ts', '.js', '.json'],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        alias: {
            '(.+)\\.js': '$1',
        },
        env: {
            LOG_LEVEL: 'silent',
        },
        coverage: {
            provider: 'v8',
            include: ['src/**/*.ts'],
            exclude: ['src/**/__tests__/**', 'src/types/**'],
        },
        testTimeout: 10000,
    },
});
