/**
 * Admin sessions, held in memory until the process restarts.
 */

import { randomBytes } from 'node:crypto';
import { logger } from '../utils/logger.js';

export interface Session {
    token:     string
    expiresAt: Date
}

export interface SessionStoreOptions {
    ttlMs?: number
    now?:   () => number
}

export class SessionStore {
    private sessions = new Map<string, number>();

    private readonly ttlMs: number;
    private readonly now:   () => number;

    constructor(options: SessionStoreOptions = {}) {
        this.ttlMs = options.ttlMs ?? 60 * 60 * 1000;
        this.now = options.now ?? Date.now;
    }

    /** Issue a session with a 256-bit random token */
    create(): Session {
        this.prune();
        const token = randomBytes(32).toString('hex');
        const expiresAt = this.now() + this.ttlMs;
        this.sessions.set(token, expiresAt);
        logger.info({ session: `${token.slice(0, 8)}...` }, 'Admin session created');
        return { token, expiresAt: new Date(expiresAt) };
    }

    /** Read-only check; expired sessions are dropped by `prune` */
    isValid(token: string | undefined): boolean {
        if(!token) {
            return false;
        }
        const expiresAt = this.sessions.get(token);
        return expiresAt !== undefined && this.now() <= expiresAt;
    }

    revoke(token: string): boolean {
        const removed = this.sessions.delete(token);
        if(removed) {
            logger.info({ session: `${token.slice(0, 8)}...` }, 'Admin session ended');
        }
        return removed;
    }

    prune(): number {
        const now = this.now();
        let removed = 0;
        for(const [token, expiresAt] of this.sessions) {
            if(now > expiresAt) {
                this.sessions.delete(token);
                removed += 1;
            }
        }
        return removed;
    }

    get size(): number {
        return this.sessions.size;
    }
}
