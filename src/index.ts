/**
 * Library entry point for embedding the aggregator in another process
 */

export * from './backend/index.js';
export { AuthGate, parseBearerToken, secretsMatch } from './auth/auth-gate.js';
export type { AuthGateOptions } from './auth/auth-gate.js';
export { SessionStore } from './auth/session-store.js';
export type { Session } from './auth/session-store.js';
export { RequestTracker } from './tracking/request-tracker.js';
export type { RequestStatistics, TrackedRequest } from './tracking/request-tracker.js';
export { createHttpApp } from './frontend/http-app.js';
export { startServer } from './frontend/index.js';
export type { RunningServer, ServeOptions } from './frontend/index.js';
export * from './errors.js';
export { loadSettings } from './utils/settings.js';
export type { Settings } from './utils/settings.js';
