/**
 * Error taxonomy for the aggregator.
 *
 * Only ConfigError and AuthError are surfaced synchronously to the caller of
 * an operation. Everything else is backend-scoped: it is logged and recorded
 * on the backend's snapshot, and never aborts work on other backends.
 */

import _ from 'lodash';

export type AggregatorErrorCode
    = | 'CONFIG_ERROR'
      | 'SPAWN_ERROR'
      | 'HEALTH_CHECK_TIMEOUT'
      | 'PROCESS_EXITED'
      | 'HANDSHAKE_ERROR'
      | 'CONNECTION_ERROR'
      | 'DISCOVERY_ERROR'
      | 'TOOL_NOT_FOUND'
      | 'BACKEND_UNAVAILABLE'
      | 'EXECUTION_ERROR'
      | 'AUTH_ERROR';

export abstract class AggregatorError extends Error {
    abstract readonly code: AggregatorErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Malformed, duplicate or unresolvable backend configuration */
export class ConfigError extends AggregatorError {
    readonly code = 'CONFIG_ERROR';
}

/** A supervised process could not be launched, or died while starting */
export class SpawnError extends AggregatorError {
    readonly code = 'SPAWN_ERROR';
}

export class HealthCheckTimeout extends AggregatorError {
    readonly code = 'HEALTH_CHECK_TIMEOUT';
}

/** A running supervised process exited without being asked to */
export class ProcessExitedError extends AggregatorError {
    readonly code = 'PROCESS_EXITED';
}

/** The backend was reached but the protocol handshake failed or timed out */
export class HandshakeError extends AggregatorError {
    readonly code = 'HANDSHAKE_ERROR';
}

/** The backend could not be reached, or its connection dropped */
export class ConnectionError extends AggregatorError {
    readonly code = 'CONNECTION_ERROR';
}

export class DiscoveryError extends AggregatorError {
    readonly code = 'DISCOVERY_ERROR';
}

export class ToolNotFoundError extends AggregatorError {
    readonly code = 'TOOL_NOT_FOUND';

    constructor(readonly qualifiedName: string) {
        super(`Tool not found: ${qualifiedName}`);
    }
}

export class BackendUnavailableError extends AggregatorError {
    readonly code = 'BACKEND_UNAVAILABLE';

    constructor(readonly backendId: string, readonly qualifiedName: string) {
        super(`Backend "${backendId}" is not available to serve ${qualifiedName}`);
    }
}

/**
 * Gate rejection. `status` is 401 for a missing or unknown credential, 403
 * for a wrong one and 429 for a locked-out login.
 */
export class AuthError extends AggregatorError {
    readonly code = 'AUTH_ERROR';

    constructor(message: string, readonly status: 401 | 403 | 429 = 401) {
        super(message);
    }
}

/** Routing-level failures: surfaced to the caller, no backend state change */
export type RoutingError = ToolNotFoundError | BackendUnavailableError;

export function isRoutingError(error: unknown): error is RoutingError {
    return error instanceof ToolNotFoundError || error instanceof BackendUnavailableError;
}

/**
 * Serializable summary of an error, as stored on backend snapshots
 */
export interface ErrorSummary {
    code:    AggregatorErrorCode | 'UNKNOWN'
    message: string
}

export function summarizeError(error: unknown): ErrorSummary {
    if(error instanceof AggregatorError) {
        return { code: error.code, message: error.message };
    }
    return { code: 'UNKNOWN', message: errorMessage(error) };
}

export function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}
