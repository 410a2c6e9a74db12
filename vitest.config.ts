import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        include: ['packages/*/test/**/*.test.ts', 'services/*/test/**/*.test.ts'],
        environment: 'node',
        // keep pino-pretty off the test output
        env: { PRETTY_LOGS: 'false', LOG_LEVEL: 'silent' },
    },
})
