import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules/**', 'dist/**'],
        // One process per file: each suite gets its own process-wide channels.
        pool: 'forks',
        testTimeout: 15000,
    },
});
