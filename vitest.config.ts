/// <reference types="vitest/config" />
/**
 * Root Vitest: single jsdom project covering every workspace package.
 * Child packages do NOT need vitest.config.ts.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const Dirname = path.dirname(fileURLToPath(import.meta.url));

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    cacheDir: 'node_modules/.vitest',
    fakeTimers: {
        loopLimit: 10_000,
        shouldClearNativeTimers: true,
        toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'] as const,
    },
    output: {
        chaiConfig: { includeStack: true, showDiff: true, truncateThreshold: 0 },
        diff: { expand: true, truncateThreshold: 0 },
    },
    patterns: {
        testExclude: ['**/node_modules/**', '**/dist/**'],
        testInclude: ['packages/*/tests/**/*.spec.{ts,tsx}'],
    },
    setupFiles: [path.resolve(Dirname, 'packages/test-utils/src/setup.ts')],
    timeouts: { hook: 10_000, slow: 5_000, test: 10_000 },
} as const);

// --- [EXPORT] ----------------------------------------------------------------

export default defineConfig({
    cacheDir: B.cacheDir,
    esbuild: { jsx: 'automatic' },
    test: {
        chaiConfig: { ...B.output.chaiConfig },
        clearMocks: true,
        diff: { ...B.output.diff },
        environment: 'jsdom',
        exclude: [...B.patterns.testExclude],
        fakeTimers: { ...B.fakeTimers, toFake: [...B.fakeTimers.toFake] },
        globals: true,
        hookTimeout: B.timeouts.hook,
        include: [...B.patterns.testInclude],
        isolate: true,
        mockReset: true,
        passWithNoTests: false,
        reporters: ['default'],
        restoreMocks: true,
        root: Dirname,
        sequence: { concurrent: false, hooks: 'stack', shuffle: false },
        setupFiles: [...B.setupFiles],
        slowTestThreshold: B.timeouts.slow,
        testTimeout: B.timeouts.test,
        unstubEnvs: true,
        unstubGlobals: true,
    },
});

export { B as VITEST_TUNING };
