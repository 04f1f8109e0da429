/// <reference types="vitest" />
import { defineConfig } from 'vite';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        includeSource: ['src/**/*.ts'],
    },
    define: {
        'import.meta.vitest': 'undefined',
    },
});
