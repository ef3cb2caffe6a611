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
            GEMRADAR_LOG_LEVEL: 'silent',
        },
        coverage: {
            provider: 'v8',
            include: ['src/**/*.ts'],
            exclude: ['src/**/__tests__/**', 'src/types/**', 'src/cli/**'],
        },
        testTimeout: 10000,
    },
});
