/**
 * Tests for timeout utilities
 */

import { describe, it, expect } from 'vitest';
import { withTimeout, cancellableDelay } from '../../src/utils/timeout.js';
import { DiscoveryError } from '../../src/errors.js';
import { delay } from '../helpers/async-utils.js';

describe('withTimeout', () => {
    it('should return result when operation completes before timeout', async () => {
        const result = await withTimeout(Promise.resolve('success'), 5000, 'Timeout');

        expect(result).toBe('success');
    });

    it('should reject with a plain Error carrying the message when the operation is too slow', async () => {
        const operation = delay(200);

        await expect(withTimeout(operation, 10, 'Operation timed out')).rejects.toThrow('Operation timed out');
    });

    it('should build the rejection from a factory when one is given', async () => {
        const operation = delay(200);

        const error: unknown = await withTimeout(operation, 10, () => new DiscoveryError('discovery took too long'))
            .catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(DiscoveryError);
        expect(error).toHaveProperty('code', 'DISCOVERY_ERROR');
    });

    it('should not call the factory when the operation wins', async () => {
        let called = false;

        await withTimeout(Promise.resolve(1), 50, () => {
            called = true;
            return new Error('unused');
        });
        await delay(80);

        expect(called).toBe(false);
    });

    it('should propagate errors from the operation', async () => {
        await expect(withTimeout(Promise.reject(new Error('Operation failed')), 5000, 'Timeout'))
            .rejects.toThrow('Operation failed');
    });

    it('should handle zero timeout', async () => {
        await expect(withTimeout(delay(100), 0, 'Instant timeout')).rejects.toThrow('Instant timeout');
    });

    it('should work with many fast operations at once', async () => {
        const results = await Promise.all(Array.from({ length: 100 }, (_unused, i) =>
            withTimeout(Promise.resolve(i), 1000, `Timeout ${i}`)));

        expect(results).toHaveLength(100);
        expect(results[99]).toBe(99);
    });
});

describe('cancellableDelay', () => {
    it('should resolve after delay', async () => {
        const startTime = Date.now();
        const { promise } = cancellableDelay(50);

        await promise;

        expect(Date.now() - startTime).toBeGreaterThanOrEqual(40); // Allow some jitter
    });

    it('should resolve immediately when cancelled', async () => {
        const { promise, cancel } = cancellableDelay(5000);

        const startTime = Date.now();
        cancel();
        await promise;

        expect(Date.now() - startTime).toBeLessThan(100);
    });

    it('should tolerate cancel after completion and repeated cancels', async () => {
        const { promise, cancel } = cancellableDelay(10);

        await promise;
        cancel();
        cancel();
    });
});
