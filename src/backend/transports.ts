/**
 * Backend transports
 *
 * Turns a resolved backend config into a connected MCP client. The rest of
 * the engine only sees the `BackendClient` surface.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { logger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { BackendConfig, ServiceBackendConfig } from '../types/config.js';

/**
 * Where and how to reach a backend once its secrets are resolved and, for a
 * service backend, its process is healthy.
 */
export type ConnectionTarget
    = | { kind: 'http', url: URL, bearerToken?: string }
      | { kind: 'stdio', command: string, args: string[], env?: Record<string, string>, cwd?: string }
      | { kind: 'service', url: URL };

/** Tool call result exactly as the backend returned it */
export type RawToolResult = Record<string, unknown>;

export interface CallOptions {
    signal?:    AbortSignal
    timeoutMs?: number
}

export interface BackendClient {
    /** List every tool the backend exposes, following pagination */
    discover(options?: CallOptions): Promise<Tool[]>
    call(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<RawToolResult>
    close(): Promise<void>
}

export interface ClientHooks {
    /** Called when the connection drops, including after `close()` */
    onClose: () => void
}

export interface ClientFactory {
    connect(backendId: string, target: ConnectionTarget, hooks: ClientHooks): Promise<BackendClient>
}

function assertNever(value: never): never {
    throw new Error(`Unhandled connection target: ${JSON.stringify(value)}`);
}

export function serviceUrl(config: ServiceBackendConfig, host = '127.0.0.1'): URL {
    return new URL(`http://${host}:${config.port}${config.mcpPath}`);
}

/**
 * Map a resolved backend config onto its connection target
 */
export function connectionTargetFor(config: BackendConfig): ConnectionTarget {
    switch(config.kind) {
        case 'http':
            return { kind: 'http', url: new URL(config.url), bearerToken: config.bearerToken };
        case 'stdio':
            return { kind: 'stdio', command: config.command, args: config.args, env: config.env, cwd: config.cwd };
        case 'service':
            return { kind: 'service', url: serviceUrl(config) };
    }
}

/**
 * Adapter over the MCP SDK client
 */
class SdkBackendClient implements BackendClient {
    constructor(private readonly client: Client) {}

    async discover(options: CallOptions = {}): Promise<Tool[]> {
        const tools: Tool[] = [];
        let cursor: string | undefined;
        do {
            const page = await this.client.listTools(
                cursor === undefined ? undefined : { cursor },
                { signal: options.signal, timeout: options.timeoutMs }
            );
            tools.push(...page.tools);
            cursor = page.nextCursor;
        } while(cursor !== undefined);
        return tools;
    }

    async call(name: string, args: Record<string, unknown>, options: CallOptions = {}): Promise<RawToolResult> {
        return this.client.callTool(
            { name, arguments: args },
            undefined,
            { signal: options.signal, timeout: options.timeoutMs }
        );
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}

/**
 * Client factory backed by the MCP SDK transports
 */
export class SdkClientFactory implements ClientFactory {
    async connect(backendId: string, target: ConnectionTarget, hooks: ClientHooks): Promise<BackendClient> {
        const transport = this.createTransport(backendId, target);

        const client = new Client({
            name:    'upstream-aggregator',
            version: VERSION,
        }, {
            capabilities: {},
        });

        client.onclose = () => {
            hooks.onClose();
        };
        client.onerror = (error: Error) => {
            logger.warn({ backendId, error: error.message }, 'Backend transport error');
        };

        logger.debug({ backendId, kind: target.kind }, 'Connecting to backend');
        await client.connect(transport);

        return new SdkBackendClient(client);
    }

    private createTransport(backendId: string, target: ConnectionTarget): Transport {
        switch(target.kind) {
            case 'http':
                return new StreamableHTTPClientTransport(target.url, {
                    requestInit: target.bearerToken === undefined
                        ? undefined
                        : { headers: { Authorization: `Bearer ${target.bearerToken}` } },
                });
            case 'service':
                return new StreamableHTTPClientTransport(target.url);
            case 'stdio': {
                const transport = new StdioClientTransport({
                    command: target.command,
                    args:    target.args,
                    env:     { ...getDefaultEnvironment(), ...target.env },
                    cwd:     target.cwd,
                    stderr:  'pipe',
                });
                // Backend stderr is diagnostics only; keep it out of our own output
                transport.stderr?.on('data', (data: Buffer) => {
                    for(const line of _.split(_.trim(data.toString()), '\n')) {
                        const trimmedLine = _.trim(line);
                        if(trimmedLine) {
                            logger.debug({ backendId }, trimmedLine);
                        }
                    }
                });
                return transport;
            }
            default:
                return assertNever(target);
        }
    }
}
