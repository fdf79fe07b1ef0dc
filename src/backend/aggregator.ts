/**
 * Upstream Aggregator
 *
 * The one object that owns every backend-facing component. The admin API and
 * the tool-call path both go through it; nothing is shared through module
 * state.
 *
 * Registry events drive the catalog:
 * - `ready`   → discover the backend's tools
 * - `crashed` → purge its entries
 * - `removed` → purge its entries
 */

import _ from 'lodash';
import { ConfigError, errorMessage, summarizeError, type ErrorSummary } from '../errors.js';
import { logger } from '../utils/logger.js';
import { createLimiter, type Limiter } from '../utils/concurrency.js';
import type { Settings } from '../utils/settings.js';
import { RequestTracker } from '../tracking/request-tracker.js';
import type { BackendDefinition, TransportKind } from '../types/config.js';
import type { HostChecks } from './backend-config.js';
import {
    ConnectionRegistry,
    type BackendCrashEvent,
    type BackendSnapshot,
    type BackendStatus
} from './connection-registry.js';
import { ProcessSupervisor, type HealthProbe, type SpawnFunction, type SupervisedProcess } from './process-supervisor.js';
import { RequestRouter, type CallContext, type ToolCallResult } from './request-router.js';
import { ToolCatalog, type RefreshResult, type ToolEntry } from './tool-catalog.js';
import type { ClientFactory } from './transports.js';

export type AggregatorSettings = Pick<
    Settings,
    | 'connectTimeoutMs'
    | 'discoveryTimeoutMs'
    | 'toolCallTimeoutMs'
    | 'healthCheckIntervalMs'
    | 'healthCheckAttempts'
    | 'healthProbeTimeoutMs'
    | 'stopGraceMs'
    | 'shutdownGraceMs'
    | 'discoveryConcurrency'
>;

export interface AggregatorOptions {
    settings:       AggregatorSettings
    clientFactory?: ClientFactory
    hostChecks?:    HostChecks
    spawn?:         SpawnFunction
    probe?:         HealthProbe
    tracker?:       RequestTracker
    env?:           NodeJS.ProcessEnv
}

export interface BackendSummary {
    name:            string
    transportKind:   TransportKind
    status:          BackendStatus
    toolCount:       number
    connectedAt?:    Date
    error?:          ErrorSummary
    discoveryError?: ErrorSummary
    process?:        SupervisedProcess
}

export interface StartupResult {
    name:    string
    status?: BackendStatus
    error?:  ErrorSummary
}

/**
 * Merge the transport kind into a config body sent without one
 */
function withKind(name: string, kind: TransportKind, config: unknown): unknown {
    if(!_.isObject(config) || Array.isArray(config)) {
        return config;
    }
    if('kind' in config && config.kind !== kind) {
        throw new ConfigError(`Backend "${name}": config kind "${String(config.kind)}" does not match transport kind "${kind}"`);
    }
    return { ...config, kind };
}

export class UpstreamAggregator {
    readonly supervisor: ProcessSupervisor;
    readonly registry:   ConnectionRegistry;
    readonly catalog:    ToolCatalog;
    readonly tracker:    RequestTracker;
    readonly router:     RequestRouter;

    private readonly discoveryLimiter: Limiter;
    private readonly refreshes = new Map<string, Promise<RefreshResult>>();
    private readonly shutdownGraceMs:  number;
    private shutdownPromise?: Promise<void>;

    constructor(options: AggregatorOptions) {
        const { settings } = options;

        this.supervisor = new ProcessSupervisor({
            host:                  '127.0.0.1',
            healthCheckIntervalMs: settings.healthCheckIntervalMs,
            healthCheckAttempts:   settings.healthCheckAttempts,
            healthProbeTimeoutMs:  settings.healthProbeTimeoutMs,
            stopGraceMs:           settings.stopGraceMs,
            spawn:                 options.spawn,
            probe:                 options.probe,
        });
        this.registry = new ConnectionRegistry({
            supervisor:       this.supervisor,
            clientFactory:    options.clientFactory,
            hostChecks:       options.hostChecks,
            connectTimeoutMs: settings.connectTimeoutMs,
            closeTimeoutMs:   settings.stopGraceMs,
            env:              options.env,
        });
        this.catalog = new ToolCatalog(this.registry, {
            discoveryTimeoutMs:   settings.discoveryTimeoutMs,
            discoveryConcurrency: settings.discoveryConcurrency,
        });
        this.tracker = options.tracker ?? new RequestTracker();
        this.router = new RequestRouter({
            catalog:       this.catalog,
            clients:       this.registry,
            tracker:       this.tracker,
            callTimeoutMs: settings.toolCallTimeoutMs,
        });
        this.discoveryLimiter = createLimiter(settings.discoveryConcurrency);
        this.shutdownGraceMs = settings.shutdownGraceMs;

        this.registry.on('ready', (backendId: string) => {
            void this.scheduleRefresh(backendId);
        });
        this.registry.on('crashed', (event: BackendCrashEvent) => {
            this.catalog.purge(event.backendId);
        });
        this.registry.on('removed', (backendId: string) => {
            this.catalog.purge(backendId);
        });
    }

    /**
     * Add every configured backend concurrently and wait for their first
     * discovery. Invalid entries are logged and reported, not thrown.
     */
    async start(definitions: readonly BackendDefinition[]): Promise<StartupResult[]> {
        logger.info({ backendCount: definitions.length }, 'Starting upstream aggregator');

        const results = await Promise.all(_.map(definitions, async ({ id, config }): Promise<StartupResult> => {
            try {
                const snapshot = await this.registry.add(id, config);
                return { name: id, status: snapshot.status, error: snapshot.error };
            } catch (error) {
                logger.error({ backendId: id, error: errorMessage(error) }, 'Skipping backend');
                return { name: id, error: summarizeError(error) };
            }
        }));
        await Promise.all(Array.from(this.refreshes.values()));

        logger.info({
            backends: results.length,
            ready:    _.filter(results, { status: 'ready' }).length,
            tools:    this.catalog.size,
        }, 'Upstream aggregator started');
        return results;
    }

    async addBackend(name: string, transportKind: TransportKind, config: unknown): Promise<BackendSummary> {
        await this.registry.add(name, withKind(name, transportKind, config));
        await this.refreshes.get(name);
        return this.requireSummary(name);
    }

    /** Resolves false when there is no such backend */
    async removeBackend(name: string): Promise<boolean> {
        return this.registry.remove(name);
    }

    async reconnectBackend(name: string): Promise<BackendSummary> {
        await this.registry.reconnect(name);
        await this.refreshes.get(name);
        return this.requireSummary(name);
    }

    async refreshBackend(name: string): Promise<RefreshResult> {
        if(!this.registry.has(name)) {
            throw new ConfigError(`Backend "${name}" does not exist`);
        }
        return this.scheduleRefresh(name);
    }

    /** Re-discover every ready backend with bounded fan-out */
    async refreshAll(): Promise<RefreshResult[]> {
        const ready = _.map(_.filter(this.registry.list(), { status: 'ready' }), 'id');
        return this.catalog.refreshMany(ready);
    }

    listBackends(): BackendSummary[] {
        return _.map(this.registry.list(), snapshot => this.toSummary(snapshot));
    }

    getBackend(name: string): BackendSummary | undefined {
        const snapshot = this.registry.snapshot(name);
        return snapshot ? this.toSummary(snapshot) : undefined;
    }

    listTools(): ToolEntry[] {
        return this.catalog.all();
    }

    async callTool(qualifiedName: string, args: Record<string, unknown> = {}, context: CallContext = {}): Promise<ToolCallResult> {
        return this.router.call(qualifiedName, args, context);
    }

    get isShuttingDown(): boolean {
        return this.shutdownPromise !== undefined;
    }

    /**
     * Stop taking mutations, let in-flight calls finish within the grace
     * period, then close every backend in parallel.
     */
    async shutdown(graceMs: number = this.shutdownGraceMs): Promise<void> {
        this.shutdownPromise ??= this.runShutdown(graceMs);
        return this.shutdownPromise;
    }

    private async runShutdown(graceMs: number): Promise<void> {
        logger.info({ graceMs, services: this.supervisor.activeCount }, 'Shutting down upstream aggregator');
        this.registry.stopAccepting();
        await this.router.drain(graceMs);
        // Stopping the processes also aborts services still health-checking,
        // which releases the backends closeAll queues behind
        await Promise.all([this.registry.closeAll(), this.supervisor.stopAll()]);
        logger.info('Upstream aggregator stopped');
    }

    private async scheduleRefresh(backendId: string): Promise<RefreshResult> {
        const refresh = this.discoveryLimiter(async () => this.catalog.refresh(backendId));
        this.refreshes.set(backendId, refresh);
        try {
            return await refresh;
        } finally {
            if(this.refreshes.get(backendId) === refresh) {
                this.refreshes.delete(backendId);
            }
        }
    }

    private requireSummary(name: string): BackendSummary {
        const summary = this.getBackend(name);
        if(!summary) {
            throw new ConfigError(`Backend "${name}" was removed`);
        }
        return summary;
    }

    private toSummary(snapshot: BackendSnapshot): BackendSummary {
        return {
            name:           snapshot.id,
            transportKind:  snapshot.transportKind,
            status:         snapshot.status,
            toolCount:      this.catalog.toolCount(snapshot.id),
            connectedAt:    snapshot.connectedAt,
            error:          snapshot.error,
            discoveryError: this.catalog.discoveryError(snapshot.id),
            process:        snapshot.process,
        };
    }
}
