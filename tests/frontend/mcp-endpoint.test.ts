/**
 * MCP endpoint: the aggregated catalog re-exposed over Streamable HTTP
 */

import { describe, it, expect, afterEach } from 'vitest';
import _ from 'lodash';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { AuthGate } from '../../src/auth/auth-gate.js';
import { createHttpApp } from '../../src/frontend/http-app.js';
import { toCallToolResult } from '../../src/frontend/mcp-endpoint.js';
import type { CallMeta } from '../../src/backend/request-router.js';
import { backendConfig, createTestAggregator, tool } from '../helpers/builders.js';
import { jsonRequest, serve } from '../helpers/http-utils.js';
import type { FakeBackendBehavior } from '../helpers/mocks.js';

const meta: CallMeta = { qualifiedName: 'alpha_echo', backendId: 'alpha', toolName: 'echo', durationMs: 3 };

describe('toCallToolResult', () => {
    it('passes content and structured content through', () => {
        expect(toCallToolResult({
            kind:              'success',
            meta,
            content:           [{ type: 'text', text: '{"sum":3}' }],
            structuredContent: { sum: 3 },
        })).toEqual({
            content:           [{ type: 'text', text: '{"sum":3}' }],
            structuredContent: { sum: 3 },
        });
    });

    it('marks execution errors and falls back to the message as content', () => {
        expect(toCallToolResult({ kind: 'execution-error', meta, message: 'backend exploded', content: [], timedOut: false })).toEqual({
            content: [{ type: 'text', text: 'backend exploded' }],
            isError: true,
        });
    });

    it('sends content the protocol does not accept as text', () => {
        expect(toCallToolResult({ kind: 'degraded', meta, degradations: [], content: [{ type: 'hologram' }] })).toEqual({
            content: [{ type: 'text', text: '[{"type":"hologram"}]' }],
            isError: false,
        });
    });
});

describe('POST /mcp', () => {
    const cleanups: (() => Promise<void>)[] = [];

    afterEach(async () => {
        for(const cleanup of cleanups.splice(0)) {
            await cleanup();
        }
    });

    async function startEndpoint(behavior: FakeBackendBehavior = { tools: [tool('echo')] }): Promise<string> {
        const { aggregator, clients } = createTestAggregator();
        clients.define('alpha', behavior);
        await aggregator.addBackend('alpha', 'http', backendConfig.http());

        const server = await serve(createHttpApp({ aggregator, auth: new AuthGate({ apiToken: 'test-secret' }) }));
        cleanups.push(async () => {
            await server.close();
            await aggregator.shutdown(0);
        });
        return server.baseUrl;
    }

    async function connectClient(baseUrl: string): Promise<Client> {
        const client = new Client({ name: 'endpoint-test', version: '0.0.0' });
        const transport = new StreamableHTTPClientTransport(new URL(`${baseUrl}/mcp`), {
            requestInit: { headers: { authorization: 'Bearer test-secret' } },
        });
        await client.connect(transport);
        cleanups.push(async () => client.close());
        return client;
    }

    it('lists the aggregated tools under their qualified names', async () => {
        const client = await connectClient(await startEndpoint({ tools: [tool('echo'), tool('add', { title: 'Add' })] }));

        const { tools } = await client.listTools();

        expect(_.map(tools, 'name')).toEqual(['alpha_add', 'alpha_echo']);
        expect(tools[0]).toMatchObject({ title: 'Add', description: 'add tool', inputSchema: { type: 'object', properties: {} } });
    });

    it('routes a tool call to its backend', async () => {
        const client = await connectClient(await startEndpoint());

        const result = await client.callTool({ name: 'alpha_echo', arguments: { text: 'hi' } });

        expect(result.content).toEqual([{ type: 'text', text: 'echo ok' }]);
        expect(result.isError).toBeFalsy();
    });

    it('returns a failed tool call as an error result', async () => {
        const client = await connectClient(await startEndpoint({
            tools: [tool('echo')],
            call:  async () => {
                throw new Error('backend exploded');
            },
        }));

        const result = await client.callTool({ name: 'alpha_echo' });

        expect(result).toMatchObject({ content: [{ type: 'text', text: 'backend exploded' }], isError: true });
    });

    it('answers an unknown tool with a protocol error', async () => {
        const client = await connectClient(await startEndpoint());

        await expect(client.callTool({ name: 'alpha_missing' })).rejects.toThrow('Tool not found: alpha_missing');
    });

    it('accepts a request that names only application/json', async () => {
        const baseUrl = await startEndpoint();

        const response = await fetch(`${baseUrl}/mcp`, jsonRequest('POST', {
            jsonrpc: '2.0',
            id:      1,
            method:  'initialize',
            params:  {
                protocolVersion: LATEST_PROTOCOL_VERSION,
                capabilities:    {},
                clientInfo:      { name: 'raw-client', version: '0.0.0' },
            },
        }, { authorization: 'Bearer test-secret', accept: 'application/json' }));
        const body: unknown = await response.json();

        expect(response.status).toBe(200);
        expect(_.get(body, 'result.serverInfo.name')).toBe('upstream-aggregator');
    });

    it('requires the API token', async () => {
        const baseUrl = await startEndpoint();

        const response = await fetch(`${baseUrl}/mcp`, jsonRequest('POST', { jsonrpc: '2.0', id: 1, method: 'tools/list' }));

        expect(response.status).toBe(401);
    });

    it('refuses GET since there is no session stream', async () => {
        const baseUrl = await startEndpoint();

        const response = await fetch(`${baseUrl}/mcp`);

        expect(response.status).toBe(405);
        expect(response.headers.get('allow')).toBe('POST');
    });
});
