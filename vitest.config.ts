import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['migration-engine/src/**/*.test.ts'],
        environment: 'node',
    },
});
