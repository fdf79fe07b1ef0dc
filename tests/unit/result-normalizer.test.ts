import { describe, it, expect } from 'vitest';
import { normalizeValue } from '../../src/backend/result-normalizer.js';

describe('normalizeValue', () => {
    it('passes plain JSON through and drops undefined members', () => {
        const { value, degradations } = normalizeValue({
            count:   1,
            label:   'x',
            flags:   [true, null],
            missing: undefined,
            nested:  { ok: false },
        });

        expect(value).toEqual({ count: 1, label: 'x', flags: [true, null], nested: { ok: false } });
        expect(degradations).toEqual([]);
    });

    it('maps undefined to null', () => {
        expect(normalizeValue(undefined).value).toBeNull();
        expect(normalizeValue([undefined]).value).toEqual([null]);
    });

    it('stringifies values JSON cannot carry and reports where they were', () => {
        function handler(): void {}

        const { value, degradations } = normalizeValue({
            ratio: Infinity,
            list:  ['a', 10n],
            fn:    handler,
            tag:   Symbol('tag'),
            empty: Number.NaN,
        });

        expect(value).toEqual({
            ratio: 'Infinity',
            list:  ['a', '10'],
            fn:    '[Function: handler]',
            tag:   'Symbol(tag)',
            empty: 'NaN',
        });
        expect(degradations).toEqual([
            { path: '$.ratio', type: 'non-finite number' },
            { path: '$.list[1]', type: 'bigint' },
            { path: '$.fn', type: 'function' },
            { path: '$.tag', type: 'symbol' },
            { path: '$.empty', type: 'non-finite number' },
        ]);
    });

    it('quotes keys that are not identifiers in paths', () => {
        const { degradations } = normalizeValue({ 'odd key': 1n });

        expect(degradations).toEqual([{ path: '$["odd key"]', type: 'bigint' }]);
    });

    it('breaks cycles but keeps shared references', () => {
        const loop: Record<string, unknown> = { name: 'loop' };
        loop.self = loop;
        const shared = { id: 7 };

        const { value, degradations } = normalizeValue({ loop, left: shared, right: shared });

        expect(value).toEqual({
            loop:  { name: 'loop', self: '[Circular]' },
            left:  { id: 7 },
            right: { id: 7 },
        });
        expect(degradations).toEqual([{ path: '$.loop.self', type: 'circular' }]);
    });

    it('converts dates to ISO strings without a degradation', () => {
        const { value, degradations } = normalizeValue({
            at:      new Date(Date.UTC(2026, 4, 17, 12, 0, 0)),
            invalid: new Date(Number.NaN),
        });

        expect(value).toEqual({ at: '2026-05-17T12:00:00.000Z', invalid: null });
        expect(degradations).toEqual([]);
    });

    it('renders class instances with inspect and names their type', () => {
        const { value, degradations } = normalizeValue({ lookup: new Map([['k', 1]]) });

        expect(value).toEqual({ lookup: 'Map(1) { \'k\' => 1 }' });
        expect(degradations).toEqual([{ path: '$.lookup', type: 'Map' }]);
    });
});
