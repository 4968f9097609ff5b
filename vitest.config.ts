import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        setupFiles: ['./src/test/setup.ts'],
        include: ['src/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json-summary', 'lcov', 'html'],
            include: [
                'src/config/**/*.ts',
                'src/services/**/*.ts',
                'src/utils/**/*.ts'
            ],
            exclude: [
                'src/test/**'
            ],
            thresholds: {
                lines: 80,
                functions: 80,
                branches: 80
            }
        }
    }
})
