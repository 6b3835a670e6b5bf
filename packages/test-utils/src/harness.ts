/**
 * Test harness: console capture, production NODE_ENV and act-wrapped timer control.
 */
import { act } from '@testing-library/react';
import { vi } from 'vitest';
import { TEST_CONSTANTS } from './constants.ts';

// --- [TYPES] -----------------------------------------------------------------

type ConsoleSpy = ReturnType<typeof vi.spyOn>;
type ConsoleMethod = 'error' | 'warn';

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Wraps fn with setup/cleanup; cleanup runs even when fn throws. */
const withCleanup = <T, C>(setup: () => C, cleanup: (ctx: C) => void, fn: (ctx: C) => T): T => {
    const ctx = setup();
    try {
        return fn(ctx);
    } finally {
        cleanup(ctx);
    }
};
const captureConsole = <T>(method: ConsoleMethod, fn: (spy: ConsoleSpy) => T): T =>
    withCleanup(
        () => vi.spyOn(console, method).mockImplementation(() => {}),
        (spy) => spy.mockRestore(),
        fn,
    );
const withEnv = <T>(env: string, fn: () => T): T =>
    withCleanup(
        () => {
            vi.stubEnv('NODE_ENV', env);
        },
        () => vi.unstubAllEnvs(),
        fn,
    );
const Harness = Object.freeze({
    console: Object.freeze({
        error: <T>(fn: (spy: ConsoleSpy) => T): T => captureConsole('error', fn),
        warn: <T>(fn: (spy: ConsoleSpy) => T): T => captureConsole('warn', fn),
    }),
    env: Object.freeze({
        production: <T>(fn: () => T): T => withEnv('production', fn),
    }),
    timers: Object.freeze({
        /** Advances fake timers inside act so state updates from timer callbacks commit. */
        advance: (ms: number = TEST_CONSTANTS.defaults.timerAdvanceMs): void => {
            act(() => {
                vi.advanceTimersByTime(ms);
            });
        },
    }),
});

// --- [EXPORT] ----------------------------------------------------------------

export { Harness as TEST_HARNESS };
export type { ConsoleSpy };
