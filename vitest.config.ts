import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        passWithNoTests: false,
        env: {
            LOG_LEVEL: 'error',
        },
    },
})
