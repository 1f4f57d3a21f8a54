import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // Gateway and probe tests bind loopback ports
        fileParallelism: false,
        testTimeout: 10000,
    },
});
