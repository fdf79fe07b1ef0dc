/**
 * Async testing utilities for handling timeouts, events, and conditions
 */

import _ from 'lodash';
import type { EventEmitter } from 'node:events';

/**
 * Wait for a condition to become true within a timeout period
 *
 * @example
 * ```typescript
 * await waitFor(() => registry.status('alpha') === 'crashed', { timeout: 2000 });
 * ```
 */
export async function waitFor(
    condition: () => boolean | Promise<boolean>,
    options: { timeout?: number, interval?: number } = {}
): Promise<void> {
    const { timeout = 5000, interval = 10 } = options;
    const startTime = Date.now();

    while(Date.now() - startTime < timeout) {
        if(await condition()) {
            return;
        }
        await delay(interval);
    }

    throw new Error(`Condition not met within ${timeout}ms`);
}

/**
 * Create a deferred promise that can be resolved or rejected externally
 *
 * @example
 * ```typescript
 * const deferred = createDeferred<string>();
 * setTimeout(() => deferred.resolve('done'), 100);
 * const result = await deferred.promise;
 * ```
 */
export interface Deferred<T> {
    promise: Promise<T>
    resolve: (value: T) => void
    reject:  (reason?: unknown) => void
}

export function createDeferred<T>(): Deferred<T> {
    let resolveFn: (value: T) => void = _.noop;
    let rejectFn: (reason?: unknown) => void = _.noop;

    const promise = new Promise<T>((resolve, reject) => {
        resolveFn = resolve;
        rejectFn = (reason?: unknown) => {
            reject(_.isError(reason) ? reason : new Error('Deferred rejected without reason'));
        };
    });

    return { promise, resolve: resolveFn, reject: rejectFn };
}

/**
 * Delay execution for a specified number of milliseconds
 */
export async function delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

/**
 * Let every already-queued callback and microtask run
 *
 * @example
 * ```typescript
 * registry.add('alpha', config); // not awaited
 * await flushPromises();
 * ```
 */
export async function flushPromises(): Promise<void> {
    await new Promise((resolve) => {
        setImmediate(resolve);
    });
}

/**
 * Collect all events emitted during an async operation
 *
 * @example
 * ```typescript
 * const events = await collectEvents<StatusChangeEvent>(
 *   registry,
 *   'status',
 *   async () => { await registry.add('alpha', config); }
 * );
 * ```
 */
export async function collectEvents<T>(
    emitter: EventEmitter,
    event: string,
    operation: () => Promise<void>
): Promise<T[]> {
    const collected: T[] = [];

    const handler = (data: T) => {
        collected.push(data);
    };

    emitter.on(event, handler);

    try {
        await operation();
    } finally {
        emitter.off(event, handler);
    }

    return collected;
}
