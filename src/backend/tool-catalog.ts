/**
 * Tool Catalog
 *
 * One flat, namespaced directory of every ready backend's tools. Each
 * backend's entries are replaced as a whole on refresh, never merged, so a
 * failed discovery leaves that backend with no tools instead of stale ones.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { DiscoveryError, errorMessage, summarizeError, type ErrorSummary } from '../errors.js';
import { logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { withTimeout } from '../utils/timeout.js';
import { QUALIFIED_NAME_SEPARATOR } from '../types/config.js';
import type { BackendClient } from './transports.js';

export interface ToolEntry {
    qualifiedName: string
    backendId:     string
    originalName:  string
    title?:        string
    description?:  string
    inputSchema:   Tool['inputSchema']
    annotations?:  Tool['annotations']
}

export interface RefreshResult {
    backendId: string
    toolCount: number
    /** False when the result was discarded because a newer refresh or purge won */
    applied:   boolean
    error?:    ErrorSummary
}

/** Where the catalog gets clients from; returns a client only for ready backends */
export interface ClientSource {
    get(backendId: string): BackendClient | undefined
}

export interface ToolCatalogOptions {
    discoveryTimeoutMs?:   number
    discoveryConcurrency?: number
}

export function qualifyName(backendId: string, originalName: string): string {
    return `${backendId}${QUALIFIED_NAME_SEPARATOR}${originalName}`;
}

export class ToolCatalog {
    private entriesByBackend = new Map<string, ToolEntry[]>();
    private index = new Map<string, ToolEntry>();
    private generations = new Map<string, number>();
    private nextGeneration = 0;
    private discoveryErrors = new Map<string, DiscoveryError>();

    private readonly discoveryTimeoutMs:   number;
    private readonly discoveryConcurrency: number;

    constructor(private readonly clients: ClientSource, options: ToolCatalogOptions = {}) {
        this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? 30_000;
        this.discoveryConcurrency = options.discoveryConcurrency ?? 4;
    }

    /**
     * Discover a backend's tools and atomically replace its entries
     */
    async refresh(backendId: string): Promise<RefreshResult> {
        const client = this.clients.get(backendId);
        if(!client) {
            this.purge(backendId);
            return {
                backendId,
                toolCount: 0,
                applied:   true,
                error:     { code: 'BACKEND_UNAVAILABLE', message: `Backend "${backendId}" is not ready` },
            };
        }

        const generation = this.beginGeneration(backendId);
        try {
            const tools = await withTimeout(
                client.discover({ timeoutMs: this.discoveryTimeoutMs }),
                this.discoveryTimeoutMs,
                () => new DiscoveryError(`Discovery for backend ${backendId} timed out after ${this.discoveryTimeoutMs}ms`)
            );

            if(!this.isCurrent(backendId, generation) || this.clients.get(backendId) !== client) {
                logger.debug({ backendId }, 'Discarding stale discovery result');
                return { backendId, toolCount: this.toolCount(backendId), applied: false };
            }

            const toolCount = this.install(backendId, tools);
            this.discoveryErrors.delete(backendId);
            logger.info({ backendId, toolCount }, 'Discovered backend tools');
            return { backendId, toolCount, applied: true };
        } catch (error) {
            const discoveryError = error instanceof DiscoveryError
                ? error
                : new DiscoveryError(`Discovery failed for backend ${backendId}: ${errorMessage(error)}`, { cause: error });

            const applied = this.isCurrent(backendId, generation);
            if(applied) {
                this.clearEntries(backendId);
                this.discoveryErrors.set(backendId, discoveryError);
            }
            logger.warn({ backendId, error: discoveryError.message }, 'Tool discovery failed');
            return { backendId, toolCount: 0, applied, error: summarizeError(discoveryError) };
        }
    }

    /**
     * Refresh several backends with bounded fan-out. One backend's failure
     * shows up in its own result only.
     */
    async refreshMany(backendIds: readonly string[]): Promise<RefreshResult[]> {
        return mapWithConcurrency(backendIds, this.discoveryConcurrency, async backendId => this.refresh(backendId));
    }

    /**
     * Drop every entry of a backend and cancel any refresh in flight for it
     */
    purge(backendId: string): void {
        this.generations.delete(backendId);
        this.discoveryErrors.delete(backendId);
        const removed = this.clearEntries(backendId);
        if(removed > 0) {
            logger.info({ backendId, removed }, 'Purged backend tools');
        }
    }

    all(): ToolEntry[] {
        return _.sortBy(Array.from(this.index.values()), 'qualifiedName');
    }

    resolve(qualifiedName: string): ToolEntry | undefined {
        return this.index.get(qualifiedName);
    }

    toolCount(backendId: string): number {
        return this.entriesByBackend.get(backendId)?.length ?? 0;
    }

    discoveryError(backendId: string): ErrorSummary | undefined {
        const error = this.discoveryErrors.get(backendId);
        return error ? summarizeError(error) : undefined;
    }

    get size(): number {
        return this.index.size;
    }

    private beginGeneration(backendId: string): number {
        const generation = ++this.nextGeneration;
        this.generations.set(backendId, generation);
        return generation;
    }

    private isCurrent(backendId: string, generation: number): boolean {
        return this.generations.get(backendId) === generation;
    }

    private clearEntries(backendId: string): number {
        const entries = this.entriesByBackend.get(backendId) ?? [];
        for(const entry of entries) {
            this.index.delete(entry.qualifiedName);
        }
        this.entriesByBackend.delete(backendId);
        return entries.length;
    }

    private install(backendId: string, tools: Tool[]): number {
        const byName = new Map<string, ToolEntry>();
        for(const tool of tools) {
            if(byName.has(tool.name)) {
                logger.warn({ backendId, tool: tool.name }, 'Backend listed the same tool twice, keeping the last');
            }
            byName.set(tool.name, {
                qualifiedName: qualifyName(backendId, tool.name),
                backendId,
                originalName:  tool.name,
                title:         tool.title,
                description:   tool.description,
                inputSchema:   tool.inputSchema,
                annotations:   tool.annotations,
            });
        }

        this.clearEntries(backendId);
        // Backend ids never contain the separator, so the prefix keeps backends apart
        const entries = Array.from(byName.values());
        for(const entry of entries) {
            this.index.set(entry.qualifiedName, entry);
        }
        this.entriesByBackend.set(backendId, entries);
        return entries.length;
    }
}
