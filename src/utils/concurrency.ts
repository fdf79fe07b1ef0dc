/**
 * Bounded-concurrency helpers
 */

/**
 * Map over `items` with at most `limit` workers in flight.
 *
 * Results keep the order of `items`. A rejecting worker rejects the whole
 * call, so callers that need per-item isolation catch inside `worker`.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let nextIndex = 0;

    const runWorker = async (): Promise<void> => {
        while(nextIndex < items.length) {
            const index = nextIndex;
            nextIndex += 1;
            results[index] = await worker(items[index], index);
        }
    };

    const workerCount = Math.max(1, Math.min(limit, items.length));
    const workers: Promise<void>[] = [];
    for(let i = 0; i < workerCount; i++) {
        workers.push(runWorker());
    }
    await Promise.all(workers);

    return results;
}

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Gate for tasks that arrive over time rather than as one batch: at most
 * `limit` run at once, the rest start in arrival order.
 */
export function createLimiter(limit: number): Limiter {
    const maxActive = Math.max(1, limit);
    const queue: (() => void)[] = [];
    let active = 0;

    const next = (): void => {
        if(active < maxActive) {
            const start = queue.shift();
            if(start) {
                active += 1;
                start();
            }
        }
    };

    return async <T>(task: () => Promise<T>): Promise<T> => {
        await new Promise<void>((resolve) => {
            queue.push(() => {
                resolve();
            });
            next();
        });
        try {
            return await task();
        } finally {
            active -= 1;
            next();
        }
    };
}
