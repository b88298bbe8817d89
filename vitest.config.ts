/*
 * For a detailed explanation regarding each configuration property and type check, visit:
 * https://vitest.dev/config/
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['packages/*/src/**'],
            exclude: [
                '**/node_modules/**',
                '**/*.test.ts'
            ],
            reportsDirectory: './coverage',
            thresholds: {
                lines: 80,
                functions: 80,
                branches: 75,
                statements: 80
            }
        },
        deps: {
            interopDefault: true
        },
        include: ['packages/*/test/**/*.test.ts']
    }
});
