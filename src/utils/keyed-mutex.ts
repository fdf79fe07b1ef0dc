/**
 * Per-key mutual exclusion.
 *
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys never wait on each other.
 */

import _ from 'lodash';

export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    /**
     * Run `task` once every earlier task for `key` has settled
     */
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = _.noop;
        const current = new Promise<void>((resolve) => {
            release = () => {
                resolve();
            };
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        try {
            await previous;
            return await task();
        } finally {
            release();
            if(this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }
}
