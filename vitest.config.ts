import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['server/src/**/*.test.ts'],
        environment: 'node',
        // Real worker processes are started by some suites.
        testTimeout: 20_000,
        hookTimeout: 20_000
    }
});
