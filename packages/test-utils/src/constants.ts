/**
 * Test constants: deterministic values for reproducible tests.
 */

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const env = (key: string): string | undefined => (typeof process === 'undefined' ? undefined : process.env[key]);
const seed = env('FC_SEED');

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    defaults: {
        timerAdvanceMs: 10,
    },
    fc: {
        interruptAfterTimeLimit: 5_000,
        numRuns: env('CI') ? 100 : 50,
        ...(seed === undefined ? {} : { seed: Number.parseInt(seed, 10) }),
    },
    frozenTime: new Date('2025-01-15T12:00:00.000Z'),
    viewport: { height: 800, width: 1280 },
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as TEST_CONSTANTS };
