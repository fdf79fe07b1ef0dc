/**
 * Request Router
 *
 * Resolves a qualified tool name, forwards the call to the owning backend
 * under its original name, and turns the outcome into a `ToolCallResult`.
 *
 * Routing failures (unknown tool, backend not ready) are thrown. Anything
 * that happens after the call was forwarded is returned as a result variant.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { BackendUnavailableError, ToolNotFoundError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { RequestTracker } from '../tracking/request-tracker.js';
import { isJsonObject, normalizeValue, type Degradation, type JsonObject, type JsonValue } from './result-normalizer.js';
import type { ClientSource, ToolEntry } from './tool-catalog.js';

export interface CallMeta {
    qualifiedName: string
    backendId:     string
    toolName:      string
    requestId?:    string
    durationMs:    number
}

export interface ToolOutput {
    content:            JsonValue[]
    structuredContent?: JsonObject
    /** Text blocks of `content`, joined with blank lines */
    text?:              string
}

export type ToolCallResult
    = | ({ kind: 'success', meta: CallMeta } & ToolOutput)
      | ({ kind: 'degraded', meta: CallMeta, degradations: Degradation[] } & ToolOutput)
      | { kind: 'execution-error', meta: CallMeta, message: string, content: JsonValue[], timedOut: boolean };

export interface ToolResolver {
    resolve(qualifiedName: string): ToolEntry | undefined
}

export interface CallContext {
    clientIp?: string
}

export interface RequestRouterOptions {
    catalog:        ToolResolver
    clients:        ClientSource
    tracker?:       RequestTracker
    callTimeoutMs?: number
}

export function extractText(content: JsonValue[]): string | undefined {
    const texts: string[] = [];
    for(const block of content) {
        if(isJsonObject(block) && block.type === 'text' && _.isString(block.text)) {
            texts.push(block.text);
        }
    }
    return texts.length > 0 ? texts.join('\n\n') : undefined;
}

function isTimeoutError(error: unknown): boolean {
    return error instanceof McpError && error.code === ErrorCode.RequestTimeout;
}

export class RequestRouter {
    private inFlight = 0;
    private idleWaiters: (() => void)[] = [];

    private readonly catalog:       ToolResolver;
    private readonly clients:       ClientSource;
    private readonly tracker?:      RequestTracker;
    private readonly callTimeoutMs: number;

    constructor(options: RequestRouterOptions) {
        this.catalog = options.catalog;
        this.clients = options.clients;
        this.tracker = options.tracker;
        this.callTimeoutMs = options.callTimeoutMs ?? 60_000;
    }

    /**
     * Route one tool call.
     *
     * @throws ToolNotFoundError when no catalog entry has this name
     * @throws BackendUnavailableError when the owning backend is not ready
     */
    async call(qualifiedName: string, args: Record<string, unknown> = {}, context: CallContext = {}): Promise<ToolCallResult> {
        const entry = this.catalog.resolve(qualifiedName);
        if(!entry) {
            throw new ToolNotFoundError(qualifiedName);
        }

        const client = this.clients.get(entry.backendId);
        if(!client) {
            throw new BackendUnavailableError(entry.backendId, qualifiedName);
        }

        const { backendId, originalName } = entry;
        const requestId = this.tracker?.create({
            qualifiedName,
            backendId,
            toolName:  originalName,
            arguments: args,
            clientIp:  context.clientIp,
        });
        if(requestId !== undefined) {
            this.tracker?.start(requestId);
        }

        const startedAt = Date.now();
        const meta = (): CallMeta => ({ qualifiedName, backendId, toolName: originalName, requestId, durationMs: Date.now() - startedAt });
        const controller = new AbortController();
        let timedOut = false;

        this.inFlight += 1;
        try {
            const raw = await withTimeout(
                client.call(originalName, args, { signal: controller.signal, timeoutMs: this.callTimeoutMs }),
                this.callTimeoutMs,
                () => {
                    timedOut = true;
                    controller.abort();
                    return new Error(`Tool ${qualifiedName} timed out after ${this.callTimeoutMs}ms`);
                }
            );
            return this.toResult(raw, meta(), requestId);
        } catch (error) {
            timedOut ||= isTimeoutError(error);
            const message = timedOut
                ? `Tool ${qualifiedName} timed out after ${this.callTimeoutMs}ms`
                : errorMessage(error);
            logger.warn({ qualifiedName, backendId, timedOut, error: message }, 'Tool call failed');
            this.fail(requestId, message);
            return { kind: 'execution-error', meta: meta(), message, content: [], timedOut };
        } finally {
            this.inFlight -= 1;
            if(this.inFlight === 0) {
                this.notifyIdle();
            }
        }
    }

    get inFlightCount(): number {
        return this.inFlight;
    }

    /**
     * Wait for in-flight calls to finish. Resolves false if the grace period
     * ran out first.
     */
    async drain(graceMs: number): Promise<boolean> {
        if(this.inFlight === 0) {
            return true;
        }

        logger.info({ inFlight: this.inFlight, graceMs }, 'Waiting for in-flight tool calls');
        const idle = new Promise<void>((resolve) => {
            this.idleWaiters.push(() => {
                resolve();
            });
        });
        try {
            await withTimeout(idle, graceMs, 'drain timed out');
            return true;
        } catch{
            logger.warn({ inFlight: this.inFlight }, 'Grace period ended with tool calls still in flight');
            return false;
        }
    }

    private notifyIdle(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for(const resolve of waiters) {
            resolve();
        }
    }

    private fail(requestId: string | undefined, message: string): void {
        if(requestId !== undefined) {
            this.tracker?.fail(requestId, message);
        }
    }

    private toResult(raw: Record<string, unknown>, meta: CallMeta, requestId: string | undefined): ToolCallResult {
        const { value, degradations } = normalizeValue(raw);
        const result: JsonObject = isJsonObject(value) ? value : {};
        const content = Array.isArray(result.content) ? result.content : [];
        const text = extractText(content);

        if(result.isError === true) {
            const message = text ?? `Tool ${meta.qualifiedName} reported an error`;
            logger.info({ qualifiedName: meta.qualifiedName, error: message }, 'Tool reported an execution error');
            this.fail(requestId, message);
            return { kind: 'execution-error', meta, message, content, timedOut: false };
        }

        const output: ToolOutput = {
            content,
            structuredContent: isJsonObject(result.structuredContent) ? result.structuredContent : undefined,
            text,
        };

        if(degradations.length > 0) {
            for(const degradation of degradations) {
                logger.warn(
                    { qualifiedName: meta.qualifiedName, path: degradation.path, type: degradation.type },
                    'Tool result value is not serializable, sent as a string'
                );
            }
            if(requestId !== undefined) {
                this.tracker?.complete(requestId, 'degraded');
            }
            return { kind: 'degraded', meta, degradations, ...output };
        }

        if(requestId !== undefined) {
            this.tracker?.complete(requestId);
        }
        return { kind: 'success', meta, ...output };
    }
}
