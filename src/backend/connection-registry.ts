/**
 * Connection Registry
 *
 * Owns the set of configured backends and their live clients:
 * - Validates and resolves a backend's config before it exists
 * - Starts the supervised process first for service backends
 * - Connects under a timeout; failures are recorded, never retried inline
 * - Tracks each backend's status and reports changes as events
 *
 * Events:
 * - `status`  `{ backendId, from, to }` on every transition
 * - `ready`   `backendId` once a client is connected
 * - `crashed` `{ backendId, error }` when a backend fails or its connection drops
 * - `removed` `backendId` once a backend has left the registry
 */

import { EventEmitter } from 'node:events';
import _ from 'lodash';
import {
    AggregatorError,
    ConfigError,
    ConnectionError,
    HandshakeError,
    errorMessage,
    summarizeError,
    type ErrorSummary
} from '../errors.js';
import { logger } from '../utils/logger.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { withTimeout } from '../utils/timeout.js';
import type { BackendConfig, TransportKind } from '../types/config.js';
import {
    defaultHostChecks,
    parseBackendConfig,
    resolveBackendSecrets,
    validateAgainstHost,
    validateBackendId,
    type HostChecks
} from './backend-config.js';
import type { ProcessCrashEvent, ProcessHandle, ProcessSupervisor, SupervisedProcess } from './process-supervisor.js';
import { connectionTargetFor, SdkClientFactory, type BackendClient, type ClientFactory } from './transports.js';

export type BackendStatus = 'connecting' | 'ready' | 'crashed' | 'stopped';

const ALLOWED_TRANSITIONS: Record<BackendStatus, readonly BackendStatus[]> = {
    connecting: ['ready', 'crashed', 'stopped'],
    ready:      ['crashed', 'stopped'],
    crashed:    ['connecting', 'stopped'],
    stopped:    [],
};

// Error codes that mean the backend could not be reached at all
const UNREACHABLE_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'ENOTFOUND',
    'EAI_AGAIN',
    'ENOENT',
    'EACCES',
    'UND_ERR_CONNECT_TIMEOUT',
]);

export interface BackendSnapshot {
    id:            string
    transportKind: TransportKind
    status:        BackendStatus
    connectedAt?:  Date
    error?:        ErrorSummary
    process?:      SupervisedProcess
}

export interface StatusChangeEvent {
    backendId: string
    from:      BackendStatus | undefined
    to:        BackendStatus
}

export interface BackendCrashEvent {
    backendId: string
    error:     AggregatorError
}

export interface ConnectionRegistryOptions {
    supervisor:        ProcessSupervisor
    clientFactory?:    ClientFactory
    hostChecks?:       HostChecks
    connectTimeoutMs?: number
    closeTimeoutMs?:   number
    env?:              NodeJS.ProcessEnv
}

interface BackendRecord {
    id:             string
    config:         BackendConfig
    status:         BackendStatus
    client?:        BackendClient
    processHandle?: ProcessHandle
    launchCount:    number
    // Bumped on every connection attempt; stale close callbacks compare against it
    attempt:        number
    connectedAt?:   Date
    error?:         AggregatorError
}

function unreachableCode(error: unknown): string | undefined {
    let current: unknown = error;
    for(let depth = 0; depth < 5 && _.isObject(current); depth++) {
        if('code' in current && _.isString(current.code) && UNREACHABLE_CODES.has(current.code)) {
            return current.code;
        }
        current = 'cause' in current ? current.cause : undefined;
    }
    return undefined;
}

export class ConnectionRegistry extends EventEmitter {
    private backends = new Map<string, BackendRecord>();
    // Ids with an add in flight, reserved synchronously
    private reserved = new Set<string>();
    private mutex = new KeyedMutex();
    private accepting = true;

    private readonly supervisor:       ProcessSupervisor;
    private readonly clientFactory:    ClientFactory;
    private readonly hostChecks:       HostChecks;
    private readonly connectTimeoutMs: number;
    private readonly closeTimeoutMs:   number;
    private readonly env:              NodeJS.ProcessEnv;

    constructor(options: ConnectionRegistryOptions) {
        super();
        this.supervisor = options.supervisor;
        this.clientFactory = options.clientFactory ?? new SdkClientFactory();
        this.hostChecks = options.hostChecks ?? defaultHostChecks;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 30_000;
        this.closeTimeoutMs = options.closeTimeoutMs ?? 5_000;
        this.env = options.env ?? process.env;

        this.supervisor.on('crashed', (event: ProcessCrashEvent) => {
            this.handleProcessCrash(event);
        });
    }

    /**
     * Validate, create and connect a backend.
     *
     * Throws ConfigError (and creates nothing) when the config is invalid.
     * Connection failures do not throw: the backend is created and recorded
     * as `crashed`, which the returned snapshot shows.
     */
    async add(id: string, rawConfig: unknown): Promise<BackendSnapshot> {
        this.assertAccepting();
        validateBackendId(id);
        if(this.backends.has(id) || this.reserved.has(id)) {
            throw new ConfigError(`Backend "${id}" already exists`);
        }

        this.reserved.add(id);
        try {
            return await this.mutex.runExclusive(id, async () => {
                const config = resolveBackendSecrets(parseBackendConfig(id, rawConfig), this.env);
                await validateAgainstHost(id, config, this.hostChecks);
                if(config.kind === 'service') {
                    this.assertPortUnclaimed(id, config.port);
                }
                this.assertAccepting();

                const record: BackendRecord = {
                    id,
                    config,
                    status:      'connecting',
                    launchCount: 0,
                    attempt:     0,
                };
                this.backends.set(id, record);
                logger.info({ backendId: id, kind: config.kind }, 'Backend added');
                this.emitSafely('status', { backendId: id, from: undefined, to: 'connecting' } satisfies StatusChangeEvent);

                await this.establish(record);
                return this.toSnapshot(record);
            });
        } finally {
            this.reserved.delete(id);
        }
    }

    /**
     * Remove a backend: drop it and notify listeners, close its client, stop
     * its process. Each step runs even if an earlier one fails.
     *
     * Resolves false when no such backend exists.
     */
    async remove(id: string): Promise<boolean> {
        this.assertAccepting();
        return this.mutex.runExclusive(id, async () => this.removeRecord(id));
    }

    /**
     * Connect a crashed backend again, relaunching its process if needed.
     * A backend in any other state is left alone.
     */
    async reconnect(id: string): Promise<BackendSnapshot> {
        this.assertAccepting();
        return this.mutex.runExclusive(id, async () => {
            const record = this.backends.get(id);
            if(!record) {
                throw new ConfigError(`Backend "${id}" does not exist`);
            }
            if(record.status !== 'crashed') {
                logger.info({ backendId: id, status: record.status }, 'Backend is not crashed, nothing to reconnect');
                return this.toSnapshot(record);
            }

            const staleClient = record.client;
            record.client = undefined;
            if(staleClient) {
                await this.closeClient(id, staleClient);
            }

            const handle = record.processHandle;
            if(handle && this.supervisor.status(handle) !== 'running') {
                await this.stopProcess(id, handle);
                record.processHandle = undefined;
            }

            logger.info({ backendId: id }, 'Reconnecting backend');
            this.setStatus(record, 'connecting');
            await this.establish(record);
            return this.toSnapshot(record);
        });
    }

    /** Live client for a `ready` backend */
    get(id: string): BackendClient | undefined {
        const record = this.backends.get(id);
        return record?.status === 'ready' ? record.client : undefined;
    }

    has(id: string): boolean {
        return this.backends.has(id);
    }

    status(id: string): BackendStatus | undefined {
        return this.backends.get(id)?.status;
    }

    snapshot(id: string): BackendSnapshot | undefined {
        const record = this.backends.get(id);
        return record ? this.toSnapshot(record) : undefined;
    }

    list(): BackendSnapshot[] {
        return _.map(_.sortBy(Array.from(this.backends.values()), 'id'), record => this.toSnapshot(record));
    }

    /** Refuse further add/remove/reconnect; used at the start of shutdown */
    stopAccepting(): void {
        this.accepting = false;
    }

    /**
     * Remove every backend in parallel, regardless of `stopAccepting`.
     * Ids with an add in flight are removed once that add settles.
     */
    async closeAll(): Promise<void> {
        const ids = _.union(Array.from(this.backends.keys()), Array.from(this.reserved));
        await Promise.all(_.map(ids, async id => this.mutex.runExclusive(id, async () => this.removeRecord(id))));
    }

    private assertAccepting(): void {
        if(!this.accepting) {
            throw new ConfigError('Aggregator is shutting down');
        }
    }

    private assertPortUnclaimed(id: string, port: number): void {
        const owner = _.find(Array.from(this.backends.values()), record => record.config.kind === 'service' && record.config.port === port);
        if(owner) {
            throw new ConfigError(`Backend "${id}": port ${port} is already used by backend "${owner.id}"`);
        }
    }

    private setStatus(record: BackendRecord, to: BackendStatus): void {
        const from = record.status;
        if(from === to) {
            return;
        }
        if(!_.includes(ALLOWED_TRANSITIONS[from], to)) {
            throw new Error(`Invalid backend status transition for ${record.id}: ${from} -> ${to}`);
        }
        record.status = to;
        logger.debug({ backendId: record.id, from, to }, 'Backend status changed');
        this.emitSafely('status', { backendId: record.id, from, to } satisfies StatusChangeEvent);
    }

    /**
     * Listener failures must not unwind a registry mutation half-way
     */
    private emitSafely(event: string, payload: unknown): void {
        try {
            this.emit(event, payload);
        } catch (error) {
            logger.error({ event, error: errorMessage(error) }, 'Registry event listener failed');
        }
    }

    /**
     * Start the process (service kind) and connect. Leaves the record `ready`
     * or `crashed`; never throws.
     */
    private async establish(record: BackendRecord): Promise<void> {
        const { id, config } = record;
        const attempt = ++record.attempt;

        try {
            if(config.kind === 'service' && !record.processHandle) {
                this.assertAccepting();
                record.processHandle = await this.supervisor.start(id, {
                    command:         config.command,
                    args:            config.args,
                    port:            config.port,
                    healthCheckPath: config.healthCheckPath,
                    env:             config.env,
                    cwd:             config.cwd,
                    restartCount:    record.launchCount++,
                });
            }

            record.client = await this.connectClient(record, attempt);
            record.connectedAt = new Date();
            record.error = undefined;
            this.setStatus(record, 'ready');
            logger.info({ backendId: id, kind: config.kind }, 'Backend connected');
            this.emitSafely('ready', id);
        } catch (error) {
            this.markCrashed(record, error instanceof AggregatorError
                ? error
                : new ConnectionError(`Failed to connect to backend ${id}: ${errorMessage(error)}`, { cause: error }));
        }
    }

    private async connectClient(record: BackendRecord, attempt: number): Promise<BackendClient> {
        const { id } = record;
        let timedOut = false;
        const pending = this.clientFactory.connect(id, connectionTargetFor(record.config), {
            onClose: () => {
                this.handleClientClosed(record, attempt);
            },
        });

        try {
            return await withTimeout(pending, this.connectTimeoutMs, () => {
                timedOut = true;
                return new HandshakeError(`Handshake with backend ${id} timed out after ${this.connectTimeoutMs}ms`);
            });
        } catch (error) {
            if(timedOut) {
                // The connection may still complete; close it if it does
                void pending
                    .then(async (late) => {
                        logger.debug({ backendId: id }, 'Closing connection that completed after its timeout');
                        await late.close();
                    })
                    .catch((lateError: unknown) => {
                        logger.debug({ backendId: id, error: errorMessage(lateError) }, 'Late connection attempt ended');
                    });
                throw error;
            }

            const code = unreachableCode(error);
            if(code !== undefined) {
                throw new ConnectionError(`Backend ${id} is unreachable (${code}): ${errorMessage(error)}`, { cause: error });
            }
            throw new HandshakeError(`Handshake with backend ${id} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    private markCrashed(record: BackendRecord, error: AggregatorError): void {
        record.error = error;
        this.setStatus(record, 'crashed');
        logger.error({ backendId: record.id, code: error.code, error: error.message }, 'Backend crashed');
        this.emitSafely('crashed', { backendId: record.id, error } satisfies BackendCrashEvent);
    }

    private handleClientClosed(record: BackendRecord, attempt: number): void {
        if(!this.isCurrentReady(record, attempt)) {
            return;
        }
        this.runExclusiveInBackground(record.id, async () => {
            if(!this.isCurrentReady(record, attempt)) {
                return;
            }
            const client = record.client;
            record.client = undefined;
            this.markCrashed(record, new ConnectionError(`Connection to backend ${record.id} closed unexpectedly`));
            if(client) {
                await this.closeClient(record.id, client);
            }
        });
    }

    private handleProcessCrash(event: ProcessCrashEvent): void {
        const { backendId } = event.handle;
        this.runExclusiveInBackground(backendId, async () => {
            const record = this.backends.get(backendId);
            if(record?.processHandle?.id !== event.handle.id) {
                return;
            }

            const client = record.client;
            record.client = undefined;
            if(record.status === 'ready') {
                this.markCrashed(record, event.error);
            }
            if(client) {
                await this.closeClient(backendId, client);
            }
        });
    }

    private isCurrentReady(record: BackendRecord, attempt: number): boolean {
        return this.backends.get(record.id) === record && record.status === 'ready' && record.attempt === attempt;
    }

    private runExclusiveInBackground(id: string, task: () => Promise<void>): void {
        this.mutex.runExclusive(id, task).catch((error: unknown) => {
            logger.error({ backendId: id, error: errorMessage(error) }, 'Background backend task failed');
        });
    }

    private async removeRecord(id: string): Promise<boolean> {
        const record = this.backends.get(id);
        if(!record) {
            return false;
        }

        this.backends.delete(id);
        const client = record.client;
        const handle = record.processHandle;
        record.client = undefined;
        record.processHandle = undefined;
        this.setStatus(record, 'stopped');
        this.emitSafely('removed', id);

        if(client) {
            await this.closeClient(id, client);
        }
        if(handle) {
            await this.stopProcess(id, handle);
        }

        logger.info({ backendId: id }, 'Backend removed');
        return true;
    }

    private async closeClient(id: string, client: BackendClient): Promise<void> {
        try {
            await withTimeout(client.close(), this.closeTimeoutMs, `Closing backend ${id} timed out after ${this.closeTimeoutMs}ms`);
        } catch (error) {
            logger.warn({ backendId: id, error: errorMessage(error) }, 'Failed to close backend client');
        }
    }

    private async stopProcess(id: string, handle: ProcessHandle): Promise<void> {
        try {
            await this.supervisor.stop(handle);
        } catch (error) {
            logger.error({ backendId: id, error: errorMessage(error) }, 'Failed to stop backend process');
        }
    }

    private toSnapshot(record: BackendRecord): BackendSnapshot {
        return {
            id:            record.id,
            transportKind: record.config.kind,
            status:        record.status,
            connectedAt:   record.status === 'ready' ? record.connectedAt : undefined,
            error:         record.error ? summarizeError(record.error) : undefined,
            process:       record.processHandle ? this.supervisor.describe(record.processHandle) : undefined,
        };
    }
}
