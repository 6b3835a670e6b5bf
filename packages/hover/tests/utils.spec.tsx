/**
 * Utility tests: structural equality used to keep hoverable snapshots stable.
 */
import { describe, expect, it } from 'vitest';
import { Physics } from '../src/core/physics.ts';
import { same } from '../src/core/utils.ts';

// --- [DESCRIBE] same ---------------------------------------------------------

describe('same', () => {
    it('compares plain records and arrays by value', () => {
        expect(same({ a: [1, { b: 'x' }] }, { a: [1, { b: 'x' }] })).toBe(true);
        expect(same({ a: [1, 2] }, { a: [1, 3] })).toBe(false);
        expect(same({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    });
    it('compares physics values structurally', () => {
        expect(same(Physics.spring({ bounce: 0.1, duration: 200 }), Physics.spring({ bounce: 0.1, duration: 200 }))).toBe(true);
        expect(same(Physics.spring({ bounce: 0.1, duration: 200 }), Physics.spring({ bounce: 0.2, duration: 200 }))).toBe(false);
    });
    it('compares freshly created elements by type, key and props', () => {
        expect(same(<b className='tip'>Rich</b>, <b className='tip'>Rich</b>)).toBe(true);
        expect(same(<b>Rich</b>, <b>Other</b>)).toBe(false);
        expect(same(<b>Rich</b>, <i>Rich</i>)).toBe(false);
        expect(same(<b key='a'>Rich</b>, <b key='b'>Rich</b>)).toBe(false);
    });
    it('compares functions by reference', () => {
        const handler = (): void => undefined;
        expect(same({ onClick: handler }, { onClick: handler })).toBe(true);
        expect(same({ onClick: handler }, { onClick: (): void => undefined })).toBe(false);
    });
});
