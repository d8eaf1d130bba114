import { defineConfig } from 'vitest/config';

export default defineConfig({
    esbuild: {
        jsx: 'automatic',
    },
    test: {
        include: ['engine/test/**/*.test.ts', 'cli/test/**/*.test.{ts,tsx}'],
        environment: 'node',
    },
});
