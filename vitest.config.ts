import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['server/test/**/*.test.ts'],
        // better-sqlite3 is a native addon; forks avoids loading it in worker threads
        pool: 'forks',
    },
});
