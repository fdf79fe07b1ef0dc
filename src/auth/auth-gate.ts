/**
 * Auth Gate
 *
 * Two independent gates that run before anything reaches the router or the
 * registry:
 * - tool calls: bearer token against the configured API token
 * - admin API: session token issued by `login`
 *
 * With no API token configured the tool-call gate is open. That is an
 * operator choice and is logged as a warning at startup.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import _ from 'lodash';
import { AuthError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { SessionStore, type Session } from './session-store.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export interface AuthGateOptions {
    apiToken?:         string
    uiPassword?:       string
    sessions?:         SessionStore
    maxLoginAttempts?: number
    lockoutMs?:        number
    now?:              () => number
}

function digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time string comparison; hashing first makes the lengths equal
 */
export function secretsMatch(presented: string, expected: string): boolean {
    return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Token from an `Authorization: Bearer <token>` header, or undefined when
 * the header is missing or uses another scheme
 */
export function parseBearerToken(header: string | undefined): string | undefined {
    if(!header) {
        return undefined;
    }
    return BEARER_PATTERN.exec(header)?.[1];
}

export class AuthGate {
    readonly sessions: SessionStore;

    private failedAttempts = new Map<string, number[]>();
    private openWarningLogged = false;

    private readonly apiToken?:       string;
    private readonly uiPassword?:     string;
    private readonly maxLoginAttempts: number;
    private readonly lockoutMs:        number;
    private readonly now:              () => number;

    constructor(options: AuthGateOptions = {}) {
        this.apiToken = options.apiToken;
        this.uiPassword = options.uiPassword;
        this.now = options.now ?? Date.now;
        this.sessions = options.sessions ?? new SessionStore({ now: this.now });
        this.maxLoginAttempts = options.maxLoginAttempts ?? 5;
        this.lockoutMs = options.lockoutMs ?? 5 * 60 * 1000;
    }

    get toolCallsOpen(): boolean {
        return this.apiToken === undefined;
    }

    get loginEnabled(): boolean {
        return this.uiPassword !== undefined;
    }

    warnIfOpen(): void {
        if(this.toolCallsOpen && !this.openWarningLogged) {
            this.openWarningLogged = true;
            logger.warn('No API token configured: the tool-call endpoints accept unauthenticated requests');
        }
    }

    authorizeToolCall(token: string | undefined): boolean {
        if(this.apiToken === undefined) {
            return true;
        }
        return token !== undefined && secretsMatch(token, this.apiToken);
    }

    /**
     * Throwing form of `authorizeToolCall` that tells a missing credential
     * (401) apart from a wrong one (403)
     */
    assertToolCall(authorizationHeader: string | undefined): void {
        if(this.apiToken === undefined) {
            return;
        }
        const token = parseBearerToken(authorizationHeader);
        if(token === undefined) {
            throw new AuthError('Missing or malformed Authorization header', 401);
        }
        if(!this.authorizeToolCall(token)) {
            throw new AuthError('Invalid API token', 403);
        }
    }

    authorizeAdmin(sessionToken: string | undefined): boolean {
        return this.sessions.isValid(sessionToken);
    }

    assertAdmin(sessionToken: string | undefined): void {
        if(!this.authorizeAdmin(sessionToken)) {
            throw new AuthError('Invalid or expired session', 401);
        }
    }

    /**
     * Exchange the dashboard password for a session.
     *
     * A client key (usually the remote address) is locked out after
     * `maxLoginAttempts` failures within `lockoutMs`.
     */
    login(password: string, clientKey: string): Session {
        if(this.uiPassword === undefined) {
            throw new AuthError('Dashboard login is disabled', 401);
        }
        this.pruneFailures();
        if(this.isRateLimited(clientKey)) {
            logger.warn({ clientKey }, 'Login rate limit exceeded');
            throw new AuthError('Too many failed login attempts, try again later', 429);
        }
        if(!secretsMatch(password, this.uiPassword)) {
            this.recordFailure(clientKey);
            logger.warn({ clientKey, trackedClients: this.trackedClientCount }, 'Failed login attempt');
            throw new AuthError('Invalid password', 401);
        }

        this.failedAttempts.delete(clientKey);
        return this.sessions.create();
    }

    logout(sessionToken: string): void {
        this.sessions.revoke(sessionToken);
    }

    /** Client keys with failures still inside the lockout window */
    get trackedClientCount(): number {
        return this.failedAttempts.size;
    }

    isRateLimited(clientKey: string): boolean {
        return this.recentFailures(clientKey).length >= this.maxLoginAttempts;
    }

    private recentFailures(clientKey: string): number[] {
        const cutoff = this.now() - this.lockoutMs;
        const recent = _.filter(this.failedAttempts.get(clientKey) ?? [], at => at > cutoff);
        if(recent.length > 0) {
            this.failedAttempts.set(clientKey, recent);
        } else {
            this.failedAttempts.delete(clientKey);
        }
        return recent;
    }

    /**
     * Forget failures older than the lockout window for every client key
     */
    private pruneFailures(): void {
        for(const clientKey of Array.from(this.failedAttempts.keys())) {
            this.recentFailures(clientKey);
        }
    }

    private recordFailure(clientKey: string): void {
        this.failedAttempts.set(clientKey, [...this.recentFailures(clientKey), this.now()]);
    }
}
