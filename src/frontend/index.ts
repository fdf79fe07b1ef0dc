/**
 * Server bootstrap
 *
 * Loads settings and the backend list, starts the HTTP front end, then
 * brings the backends up. From the moment the server listens, SIGINT/SIGTERM
 * run the aggregator's graceful shutdown before the process exits.
 */

import type { Server as HttpServer } from 'node:http';
import type { Express } from 'express';
import _ from 'lodash';
import { AuthGate } from '../auth/auth-gate.js';
import { SessionStore } from '../auth/session-store.js';
import { UpstreamAggregator } from '../backend/aggregator.js';
import { errorMessage } from '../errors.js';
import { loadBackendDefinitions } from '../utils/config-loader.js';
import { getBackendsConfigPath } from '../utils/config-paths.js';
import { logger } from '../utils/logger.js';
import { loadSettings, type Settings } from '../utils/settings.js';
import { createHttpApp } from './http-app.js';

export interface ServeOptions {
    /** Backend list to load; defaults to backends.json in the data directory */
    configPath?:    string
    settings?:      Settings
    handleSignals?: boolean
    /** Prebuilt aggregator to serve; built from `settings` when omitted */
    aggregator?:    UpstreamAggregator
}

export interface RunningServer {
    app:        Express
    httpServer: HttpServer
    aggregator: UpstreamAggregator
    auth:       AuthGate
    port:       number
    close:      () => Promise<void>
}

async function listen(app: Express, host: string, port: number): Promise<HttpServer> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once('listening', () => {
            resolve(server);
        });
        server.once('error', reject);
    });
}

async function closeHttpServer(server: HttpServer): Promise<void> {
    await new Promise<void>((resolve, reject) => {
        server.close((error) => {
            if(error) {
                reject(error);
                return;
            }
            resolve();
        });
        server.closeIdleConnections();
    });
}

/**
 * Start the aggregator and its HTTP front end
 */
export async function startServer(options: ServeOptions = {}): Promise<RunningServer> {
    const settings = options.settings ?? loadSettings();
    const configPath = options.configPath ?? getBackendsConfigPath();

    logger.info({ configPath }, 'Loading backend configuration');
    const definitions = await loadBackendDefinitions(configPath, options.configPath !== undefined);

    const aggregator = options.aggregator ?? new UpstreamAggregator({ settings });
    const auth = new AuthGate({
        apiToken:   settings.apiToken,
        uiPassword: settings.uiPassword,
        sessions:   new SessionStore({ ttlMs: settings.sessionTtlMs }),
    });
    auth.warnIfOpen();
    if(!auth.loginEnabled) {
        logger.warn('UI_PASSWORD is not set: dashboard login is disabled');
    }

    const app = createHttpApp({ aggregator, auth });
    const httpServer = await listen(app, settings.host, settings.port);
    const address = httpServer.address();
    const port = address !== null && typeof address === 'object' ? address.port : settings.port;
    logger.info({ host: settings.host, port }, 'HTTP server listening');

    let detachSignals: () => void = _.noop;
    let closing: Promise<void> | undefined;
    const close = async (): Promise<void> => {
        closing ??= (async () => {
            detachSignals();
            const httpClosed = closeHttpServer(httpServer);
            await aggregator.shutdown(settings.shutdownGraceMs);
            httpServer.closeAllConnections();
            await httpClosed;
            logger.info('Server stopped');
        })();
        return closing;
    };

    // Before start(): a signal while backends are still coming up must run close()
    if(options.handleSignals ?? true) {
        const shutdown = (signal: NodeJS.Signals): void => {
            logger.info({ signal }, 'Received shutdown signal');
            close()
                .then(() => {
                    process.exit(0);
                })
                .catch((error: unknown) => {
                    logger.error({ error: errorMessage(error) }, 'Shutdown failed');
                    process.exit(1);
                });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
        detachSignals = () => {
            process.removeListener('SIGINT', shutdown);
            process.removeListener('SIGTERM', shutdown);
        };
    }

    try {
        await aggregator.start(definitions);
    } catch (error) {
        await close();
        throw error;
    }

    return { app, httpServer, aggregator, auth, port, close };
}
