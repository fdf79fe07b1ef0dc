import { describe, it, expect } from 'vitest';
import { createLimiter, mapWithConcurrency } from '../../src/utils/concurrency.js';
import { createDeferred, delay, flushPromises } from '../helpers/async-utils.js';

describe('mapWithConcurrency', () => {
    it('keeps result order and never exceeds the limit', async () => {
        let active = 0;
        let peak = 0;

        const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (ms, index) => {
            active += 1;
            peak = Math.max(peak, active);
            await delay(ms);
            active -= 1;
            return `${index}:${ms}`;
        });

        expect(results).toEqual(['0:30', '1:10', '2:20', '3:5', '4:15']);
        expect(peak).toBe(2);
    });

    it('returns an empty array for no items', async () => {
        expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
    });

    it('rejects when a worker rejects', async () => {
        await expect(mapWithConcurrency([1, 2], 2, async (item) => {
            if(item === 2) {
                throw new Error('worker 2 failed');
            }
            return item;
        })).rejects.toThrow('worker 2 failed');
    });
});

describe('createLimiter', () => {
    it('starts queued tasks in arrival order as slots free up', async () => {
        const limit = createLimiter(1);
        const gate = createDeferred<void>();
        const started: string[] = [];

        const first = limit(async () => {
            started.push('first');
            await gate.promise;
            return 'first';
        });
        const second = limit(async () => {
            started.push('second');
            return 'second';
        });
        const third = limit(async () => {
            started.push('third');
            return 'third';
        });

        await flushPromises();
        expect(started).toEqual(['first']);

        gate.resolve();
        expect(await Promise.all([first, second, third])).toEqual(['first', 'second', 'third']);
        expect(started).toEqual(['first', 'second', 'third']);
    });

    it('frees the slot when a task rejects', async () => {
        const limit = createLimiter(1);

        const failing = limit(async () => {
            throw new Error('boom');
        });
        const next = limit(async () => 'ran');

        await expect(failing).rejects.toThrow('boom');
        expect(await next).toBe('ran');
    });

    it('treats a limit below one as one', async () => {
        const limit = createLimiter(0);

        expect(await limit(async () => 'ok')).toBe('ok');
    });
});
