/**
 * MCP endpoint
 *
 * Re-exposes the aggregated catalog over Streamable HTTP. Each POST gets a
 * fresh stateless server/transport pair; `tools/list` reads the catalog and
 * `tools/call` goes through the router.
 */

import type { IncomingMessage } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
    CallToolRequestSchema,
    CallToolResultSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
    type CallToolResult,
    type Tool
} from '@modelcontextprotocol/sdk/types.js';
import type { Request, RequestHandler, Response } from 'express';
import _ from 'lodash';
import { errorMessage, isRoutingError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { UpstreamAggregator } from '../backend/aggregator.js';
import type { ToolCallResult } from '../backend/request-router.js';
import type { ToolEntry } from '../backend/tool-catalog.js';

const STREAMABLE_ACCEPT = 'application/json, text/event-stream';

function toTool(entry: ToolEntry): Tool {
    return {
        name:        entry.qualifiedName,
        title:       entry.title,
        description: entry.description,
        inputSchema: entry.inputSchema,
        annotations: entry.annotations,
    };
}

/**
 * Map a routed result onto the protocol's tool result shape
 */
export function toCallToolResult(result: ToolCallResult): CallToolResult {
    const candidate = result.kind === 'execution-error'
        ? {
            content: result.content.length > 0 ? result.content : [{ type: 'text', text: result.message }],
            isError: true,
        }
        : {
            content:           result.content,
            structuredContent: result.structuredContent,
        };

    const parsed = CallToolResultSchema.safeParse(candidate);
    if(parsed.success) {
        return parsed.data;
    }

    logger.warn({ tool: result.meta.qualifiedName, error: parsed.error.message }, 'Backend result is not a valid tool result, sending it as text');
    return {
        content: [{
            type: 'text',
            text: result.kind === 'execution-error' ? result.message : JSON.stringify(result.content),
        }],
        isError: result.kind === 'execution-error',
    };
}

export function createMcpServer(aggregator: UpstreamAggregator): Server {
    const server = new Server({
        name:    'upstream-aggregator',
        version: VERSION,
    }, {
        capabilities: {
            tools: {},
        },
    });

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        const tools = _.map(aggregator.listTools(), toTool);
        logger.debug({ toolCount: tools.length }, 'Handling tools/list request');
        return { tools };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        logger.info({ name }, 'Handling tools/call request');

        try {
            return toCallToolResult(await aggregator.callTool(name, args ?? {}));
        } catch (error) {
            if(isRoutingError(error)) {
                throw new McpError(ErrorCode.InvalidParams, error.message, { code: error.code });
            }
            throw error;
        }
    });

    return server;
}

/**
 * The transport insists on both media types in Accept; some clients send one
 */
function normalizeAccept(req: IncomingMessage): void {
    const accept = req.headers.accept ?? '';
    if(_.includes(accept, 'application/json') && _.includes(accept, 'text/event-stream')) {
        return;
    }
    req.headers.accept = STREAMABLE_ACCEPT;
    const index = _.findIndex(req.rawHeaders, (value, position) => position % 2 === 0 && value.toLowerCase() === 'accept');
    if(index === -1) {
        req.rawHeaders.push('Accept', STREAMABLE_ACCEPT);
    } else {
        req.rawHeaders[index + 1] = STREAMABLE_ACCEPT;
    }
}

export function mcpRequestHandler(aggregator: UpstreamAggregator): RequestHandler {
    return (req: Request, res: Response, next) => {
        normalizeAccept(req);
        const server = createMcpServer(aggregator);
        const transport = new StreamableHTTPServerTransport({
            sessionIdGenerator: undefined,
            enableJsonResponse: true,
        });

        res.on('close', () => {
            Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
                logger.debug({ error: errorMessage(error) }, 'Error closing MCP request transport');
            });
        });

        server.connect(transport)
            .then(async () => transport.handleRequest(req, res, req.body))
            .catch(next);
    };
}
