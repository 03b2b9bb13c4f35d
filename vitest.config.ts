import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['test/**/*.test.ts'],
        setupFiles: ['test/setup/suppressConsole.ts'],
        coverage: {
            provider: 'istanbul',
            reporter: ['text', 'lcov'],
            all: true,
            include: ['src/**/*.ts'],
            exclude: [
                'src/**/types/**',
                'src/index.ts',
                'test/**',
                'dist/**',
                'node_modules/**'
            ],
            reportsDirectory: 'coverage'
        }
    }
});
