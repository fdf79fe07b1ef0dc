/**
 * HTTP front end
 *
 * - `/tools/call` and `/mcp`: bearer-token gated tool invocation
 * - `/login`, `/logout`, `/api/*`: session-gated admin API for the dashboard
 * - `/health`: open liveness probe
 *
 * Every gate runs before the aggregator is touched.
 */

import express, {
    type ErrorRequestHandler,
    type Express,
    type Request,
    type RequestHandler,
    type Response
} from 'express';
import _ from 'lodash';
import { z } from 'zod';
import {
    AuthError,
    type AggregatorErrorCode,
    BackendUnavailableError,
    ConfigError,
    errorMessage,
    isRoutingError
} from '../errors.js';
import { logger } from '../utils/logger.js';
import { TransportKindSchema } from '../types/config.js';
import { REQUEST_STATUSES } from '../tracking/request-tracker.js';
import type { AuthGate } from '../auth/auth-gate.js';
import type { UpstreamAggregator } from '../backend/aggregator.js';
import type { ToolCallResult } from '../backend/request-router.js';
import { mcpRequestHandler } from './mcp-endpoint.js';

export const SESSION_HEADER = 'x-session-token';

const LoginBodySchema = z.object({
    password: z.string(),
});

const AddBackendBodySchema = z.object({
    name:          z.string(),
    transportKind: TransportKindSchema,
    config:        z.unknown(),
});

const ToolCallBodySchema = z.object({
    qualifiedToolName: z.string().min(1),
    arguments:         z.record(z.string(), z.unknown()).default({}),
});

const RequestsQuerySchema = z.object({
    limit:   z.coerce.number().int().positive().max(1000).default(100),
    status:  z.enum(REQUEST_STATUSES).optional(),
    backend: z.string().optional(),
});

export interface HttpAppOptions {
    aggregator: UpstreamAggregator
    auth:       AuthGate
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/**
 * Express 4 does not catch rejected promises from handlers
 */
function asyncHandler(route: AsyncRoute): RequestHandler {
    return (req, res, next) => {
        route(req, res).catch(next);
    };
}

/** Thrown for a malformed request body or query */
class BadRequestError extends Error {}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
    const parsed = schema.safeParse(input);
    if(!parsed.success) {
        throw new BadRequestError(_.map(parsed.error.issues, issue => `${_.join(issue.path, '.') || 'body'}: ${issue.message}`).join(', '));
    }
    return parsed.data;
}

function requireSession(auth: AuthGate): RequestHandler {
    return (req, res, next) => {
        try {
            auth.assertAdmin(req.get(SESSION_HEADER));
        } catch (error) {
            if(error instanceof AuthError) {
                res.status(error.status).json({ error: error.message });
                return;
            }
            next(error);
            return;
        }
        next();
    };
}

function requireApiToken(auth: AuthGate): RequestHandler {
    return (req, res, next) => {
        try {
            auth.assertToolCall(req.get('authorization'));
        } catch (error) {
            if(error instanceof AuthError) {
                res.status(error.status).json({ ok: false, error: { type: 'auth', code: error.code, message: error.message } });
                return;
            }
            next(error);
            return;
        }
        next();
    };
}

function toolCallResponse(result: ToolCallResult): { status: number, body: Record<string, unknown> } {
    switch(result.kind) {
        case 'success':
        case 'degraded':
            return {
                status: 200,
                body:   {
                    ok:                true,
                    degraded:          result.kind === 'degraded',
                    content:           result.content,
                    structuredContent: result.structuredContent,
                    text:              result.text,
                    degradations:      result.kind === 'degraded' ? result.degradations : undefined,
                    meta:              result.meta,
                },
            };
        case 'execution-error':
            return {
                status: 502,
                body:   {
                    ok:    false,
                    error: {
                        type:     'execution',
                        code:     'EXECUTION_ERROR' satisfies AggregatorErrorCode,
                        message:  result.message,
                        timedOut: result.timedOut,
                        content:  result.content,
                    },
                    meta: result.meta,
                },
            };
    }
}

export function createHttpApp(options: HttpAppOptions): Express {
    const { aggregator, auth } = options;
    const app = express();
    const adminOnly = requireSession(auth);
    const apiTokenOnly = requireApiToken(auth);

    app.disable('x-powered-by');
    app.use(express.json({ limit: '4mb' }));

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok' });
    });

    // --- Tool invocation ---

    app.post('/tools/call', apiTokenOnly, asyncHandler(async (req, res) => {
        const body = parseInput(ToolCallBodySchema, req.body);
        try {
            const { status, body: responseBody } = toolCallResponse(
                await aggregator.callTool(body.qualifiedToolName, body.arguments, { clientIp: req.ip })
            );
            res.status(status).json(responseBody);
        } catch (error) {
            if(!isRoutingError(error)) {
                throw error;
            }
            res.status(error instanceof BackendUnavailableError ? 503 : 404).json({
                ok:    false,
                error: { type: 'routing', code: error.code, message: error.message },
            });
        }
    }));

    app.post('/mcp', apiTokenOnly, mcpRequestHandler(aggregator));

    // Stateless: there is no standalone SSE stream and no session to delete
    const methodNotAllowed: RequestHandler = (_req, res) => {
        res.status(405).set('Allow', 'POST').json({
            jsonrpc: '2.0',
            error:   { code: -32000, message: 'Method not allowed.' },
            id:      null,
        });
    };
    app.get('/mcp', methodNotAllowed);
    app.delete('/mcp', methodNotAllowed);

    // --- Admin session ---

    app.post('/login', (req, res) => {
        const { password } = parseInput(LoginBodySchema, req.body);
        const session = auth.login(password, req.ip ?? 'unknown');
        res.json({ token: session.token, expiresAt: session.expiresAt.toISOString() });
    });

    app.post('/logout', adminOnly, (req, res) => {
        const token = req.get(SESSION_HEADER);
        if(token) {
            auth.logout(token);
        }
        res.status(204).end();
    });

    // --- Admin API ---

    app.get('/api/backends', adminOnly, (_req, res) => {
        res.json(aggregator.listBackends());
    });

    app.post('/api/backends', adminOnly, asyncHandler(async (req, res) => {
        const body = parseInput(AddBackendBodySchema, req.body);
        res.status(201).json(await aggregator.addBackend(body.name, body.transportKind, body.config));
    }));

    app.post('/api/backends/refresh', adminOnly, asyncHandler(async (_req, res) => {
        res.json(await aggregator.refreshAll());
    }));

    app.delete('/api/backends/:name', adminOnly, asyncHandler(async (req, res) => {
        if(await aggregator.removeBackend(req.params.name)) {
            res.status(204).end();
            return;
        }
        res.status(404).json({ error: `Backend "${req.params.name}" not found` });
    }));

    app.post('/api/backends/:name/reconnect', adminOnly, asyncHandler(async (req, res) => {
        if(!aggregator.getBackend(req.params.name)) {
            res.status(404).json({ error: `Backend "${req.params.name}" not found` });
            return;
        }
        res.json(await aggregator.reconnectBackend(req.params.name));
    }));

    app.post('/api/backends/:name/refresh', adminOnly, asyncHandler(async (req, res) => {
        if(!aggregator.getBackend(req.params.name)) {
            res.status(404).json({ error: `Backend "${req.params.name}" not found` });
            return;
        }
        const { backendId, toolCount, error } = await aggregator.refreshBackend(req.params.name);
        res.json({ backendId, toolCount, error });
    }));

    app.get('/api/tools', adminOnly, (_req, res) => {
        res.json(aggregator.listTools());
    });

    app.get('/api/requests', adminOnly, (req, res) => {
        const query = parseInput(RequestsQuerySchema, req.query);
        res.json(aggregator.tracker.list({ limit: query.limit, status: query.status, backendId: query.backend }));
    });

    app.get('/api/requests/stats', adminOnly, (_req, res) => {
        res.json(aggregator.tracker.statistics());
    });

    app.get('/api/requests/:id', adminOnly, (req, res) => {
        const request = aggregator.tracker.get(req.params.id);
        if(!request) {
            res.status(404).json({ error: `Request "${req.params.id}" not found` });
            return;
        }
        res.json(request);
    });

    const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
        if(error instanceof BadRequestError || error instanceof ConfigError) {
            res.status(400).json({ error: error.message });
            return;
        }
        if(error instanceof AuthError) {
            res.status(error.status).json({ error: error.message });
            return;
        }
        if(error instanceof SyntaxError) {
            // express.json() rejected the body
            res.status(400).json({ error: 'Request body is not valid JSON' });
            return;
        }
        logger.error({ method: req.method, path: req.path, error: errorMessage(error) }, 'Unhandled request error');
        if(res.headersSent) {
            return;
        }
        res.status(500).json({ error: 'Internal server error' });
    };
    app.use(errorHandler);

    return app;
}
