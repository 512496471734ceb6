import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // src/**/*.test.ts(x) run under node:test
        include: ['tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'lcov', 'html'],
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts', 'src/types.ts', 'src/index.ts', 'src/cli.ts'],
        },
    },
});
