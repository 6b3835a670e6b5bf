/**
 * Test setup: fake timers, frozen clock and global fast-check parameters for every spec.
 */
import fc from 'fast-check';
import { afterEach, beforeEach, vi } from 'vitest';
import { TEST_CONSTANTS } from './constants.ts';

// --- [ENTRY_POINT] -----------------------------------------------------------

fc.configureGlobal(TEST_CONSTANTS.fc);

beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(TEST_CONSTANTS.frozenTime);
});

afterEach(() => vi.useRealTimers());
