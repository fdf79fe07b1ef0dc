/**
 * Auth gate: tool-call bearer tokens, dashboard login and sessions
 */

import { describe, it, expect } from 'vitest';
import { AuthGate, parseBearerToken, secretsMatch } from '../../src/auth/auth-gate.js';
import { SessionStore } from '../../src/auth/session-store.js';
import { AuthError } from '../../src/errors.js';

function captureAuthError(action: () => unknown): AuthError {
    try {
        action();
    } catch (error) {
        if(error instanceof AuthError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected an AuthError');
}

function manualClock(start = 1_000_000): { now: () => number, advance: (ms: number) => void } {
    let current = start;
    return {
        now:     () => current,
        advance: (ms) => {
            current += ms;
        },
    };
}

describe('parseBearerToken', () => {
    it('extracts the token case-insensitively', () => {
        expect(parseBearerToken('Bearer test-token')).toBe('test-token');
        expect(parseBearerToken('bearer   test-token  ')).toBe('test-token');
    });

    it('returns undefined for a missing header or another scheme', () => {
        expect(parseBearerToken(undefined)).toBeUndefined();
        expect(parseBearerToken('Basic dXNlcjpwYXNz')).toBeUndefined();
        expect(parseBearerToken('Bearer')).toBeUndefined();
    });
});

describe('secretsMatch', () => {
    it('compares values of any length', () => {
        expect(secretsMatch('test-secret', 'test-secret')).toBe(true);
        expect(secretsMatch('test-secret', 'test-secret-longer')).toBe(false);
        expect(secretsMatch('', 'test-secret')).toBe(false);
    });
});

describe('AuthGate tool calls', () => {
    it('is open when no API token is configured', () => {
        const gate = new AuthGate();

        expect(gate.toolCallsOpen).toBe(true);
        expect(gate.authorizeToolCall(undefined)).toBe(true);
        expect(() => {
            gate.assertToolCall(undefined);
        }).not.toThrow();
    });

    it('accepts only the configured token', () => {
        const gate = new AuthGate({ apiToken: 'test-token' });

        expect(gate.authorizeToolCall('test-token')).toBe(true);
        expect(gate.authorizeToolCall('wrong-token')).toBe(false);
        expect(gate.authorizeToolCall(undefined)).toBe(false);
    });

    it('answers 401 for a missing credential and 403 for a wrong one', () => {
        const gate = new AuthGate({ apiToken: 'test-token' });

        expect(captureAuthError(() => {
            gate.assertToolCall(undefined);
        }).status).toBe(401);
        expect(captureAuthError(() => {
            gate.assertToolCall('Basic abc');
        }).status).toBe(401);
        expect(captureAuthError(() => {
            gate.assertToolCall('Bearer wrong-token');
        }).status).toBe(403);
        expect(() => {
            gate.assertToolCall('Bearer test-token');
        }).not.toThrow();
    });
});

describe('AuthGate login', () => {
    it('is disabled without a password', () => {
        const gate = new AuthGate();

        expect(gate.loginEnabled).toBe(false);
        const error = captureAuthError(() => gate.login('anything', '10.0.0.1'));
        expect(error.message).toBe('Dashboard login is disabled');
        expect(error.status).toBe(401);
    });

    it('issues a session that authorizes the admin API until logout', () => {
        const gate = new AuthGate({ uiPassword: 'test-password' });

        const session = gate.login('test-password', '10.0.0.1');

        expect(session.token).toMatch(/^[0-9a-f]{64}$/);
        expect(gate.authorizeAdmin(session.token)).toBe(true);
        expect(gate.authorizeAdmin('not-a-session')).toBe(false);
        expect(gate.authorizeAdmin(undefined)).toBe(false);

        gate.logout(session.token);
        expect(gate.authorizeAdmin(session.token)).toBe(false);
        expect(captureAuthError(() => {
            gate.assertAdmin(session.token);
        }).status).toBe(401);
    });

    it('locks a client out after five failures within the window', () => {
        const clock = manualClock();
        const gate = new AuthGate({ uiPassword: 'test-password', now: clock.now });

        for(let attempt = 0; attempt < 5; attempt++) {
            expect(captureAuthError(() => gate.login('wrong', '10.0.0.1')).status).toBe(401);
        }

        expect(gate.isRateLimited('10.0.0.1')).toBe(true);
        expect(captureAuthError(() => gate.login('test-password', '10.0.0.1')).status).toBe(429);

        // Other clients are unaffected
        expect(gate.login('test-password', '10.0.0.2').token).toHaveLength(64);

        clock.advance(5 * 60 * 1000);
        expect(gate.isRateLimited('10.0.0.1')).toBe(false);
        expect(gate.login('test-password', '10.0.0.1').token).toHaveLength(64);
    });

    it('forgets expired failures of clients that never come back', () => {
        const clock = manualClock();
        const gate = new AuthGate({ uiPassword: 'test-password', now: clock.now });
        captureAuthError(() => gate.login('wrong', '10.0.0.1'));
        captureAuthError(() => gate.login('wrong', '10.0.0.2'));
        expect(gate.trackedClientCount).toBe(2);

        clock.advance(5 * 60 * 1000);
        captureAuthError(() => gate.login('wrong', '10.0.0.3'));

        expect(gate.trackedClientCount).toBe(1);
    });

    it('clears the failure count after a successful login', () => {
        const gate = new AuthGate({ uiPassword: 'test-password', maxLoginAttempts: 2 });

        captureAuthError(() => gate.login('wrong', '10.0.0.1'));
        gate.login('test-password', '10.0.0.1');
        captureAuthError(() => gate.login('wrong', '10.0.0.1'));

        expect(gate.isRateLimited('10.0.0.1')).toBe(false);
    });
});

describe('SessionStore', () => {
    it('expires sessions after the TTL', () => {
        const clock = manualClock();
        const store = new SessionStore({ ttlMs: 1000, now: clock.now });

        const session = store.create();
        expect(session.expiresAt.getTime()).toBe(1_001_000);

        clock.advance(1000);
        expect(store.isValid(session.token)).toBe(true);

        clock.advance(1);
        expect(store.isValid(session.token)).toBe(false);
        expect(store.size).toBe(1);
        expect(store.prune()).toBe(1);
        expect(store.size).toBe(0);
    });

    it('prunes expired sessions when a new one is created', () => {
        const clock = manualClock();
        const store = new SessionStore({ ttlMs: 1000, now: clock.now });

        store.create();
        clock.advance(2000);
        store.create();

        expect(store.size).toBe(1);
    });

    it('revokes a session once', () => {
        const store = new SessionStore();
        const { token } = store.create();

        expect(store.revoke(token)).toBe(true);
        expect(store.revoke(token)).toBe(false);
    });
});
