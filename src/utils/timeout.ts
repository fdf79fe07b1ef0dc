/**
 * Timeout Utilities
 *
 * Every suspension point that talks to a backend (spawn, health probe,
 * handshake, discovery, tool call, close) goes through these helpers so one
 * unresponsive backend cannot stall the others.
 */

/**
 * Race a promise against a timeout, clearing the timer whichever settles first.
 *
 * @param timeoutError - message for a plain Error, or a factory for a typed one
 *
 * @example
 * const tools = await withTimeout(
 *   client.discover(),
 *   5000,
 *   () => new DiscoveryError('Discovery timed out after 5000ms')
 * );
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutError: string | (() => Error)
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(typeof timeoutError === 'string' ? new Error(timeoutError) : timeoutError());
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}

/**
 * Create a cancellable delay. Cancelling resolves the promise early.
 *
 * @example
 * const { promise, cancel } = cancellableDelay(5000);
 * // Later, if needed:
 * cancel();
 */
export function cancellableDelay(delayMs: number): {
    promise: Promise<void>
    cancel:  () => void
} {
    let timeoutHandle: NodeJS.Timeout | undefined;
    let resolveFn: (() => void) | undefined;

    const promise = new Promise<void>((resolve) => {
        resolveFn = resolve;
        timeoutHandle = setTimeout(() => {
            resolve();
        }, delayMs);
    });

    const cancel = (): void => {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
        if(resolveFn !== undefined) {
            resolveFn();
        }
    };

    return { promise, cancel };
}
