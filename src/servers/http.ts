/**
 * HTTP Server
 *
 * Hono-based HTTP boundary of the bridge. Routes are one handler per file under
 * src/routes; every failure is answered with the JSON error envelope.
 */

import { Server } from 'node:http';

import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';

import { createErrorResponse } from '../lib/api-helpers.js';
import type { ServerConfig } from '../lib/config.js';
import { HttpErrors } from '../lib/errors/http-error.js';
import type { AppEnv, BridgeServices } from '../lib/services.js';

// Middleware
import * as middleware from '../lib/middleware/index.js';

// Route handlers
import HealthGet from '../routes/health/GET.js';
import StatsGet from '../routes/stats/GET.js';
import InitPost from '../routes/init/POST.js';
import ShutdownPost from '../routes/shutdown/POST.js';
import ToolsSchemaGet from '../routes/tools-schema/GET.js';
import ToolsPost from '../routes/tools/POST.js';
import CallToolPost from '../routes/call-tool/POST.js';

/**
 * Create and configure the Hono HTTP app
 */
export function createHttpApp(services: BridgeServices): Hono<AppEnv> {
    const app = new Hono<AppEnv>();

    app.use('*', middleware.servicesMiddleware(services));
    app.use('*', middleware.requestLoggerMiddleware);
    app.use('*', middleware.bodyParserMiddleware);

    // Public endpoints
    app.get('/health', HealthGet);
    app.get('/stats', StatsGet);
    app.get('/tools-schema', ToolsSchemaGet);

    // Session lifecycle
    app.post('/init', InitPost);
    app.post('/shutdown', ShutdownPost);

    // Session-bound tool access
    app.post('/tools', ToolsPost);
    app.post('/call-tool', CallToolPost);

    // Error handling
    app.onError((err, c) => {
        services.logger.error(`${c.req.method} ${c.req.path} failed`, { error: err.message });
        return createErrorResponse(c, err);
    });

    // 404 handler
    app.notFound(c => createErrorResponse(c, HttpErrors.notFound()));

    return app;
}

export interface HttpServerHandle {
    app: Hono<AppEnv>;
    server: ServerType;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server
 */
export function startHttpServer(services: BridgeServices, config: ServerConfig): HttpServerHandle {
    const app = createHttpApp(services);
    const logger = services.logger;

    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, info => {
        logger.info('HTTP server running', { port: info.port, url: `http://${config.host}:${info.port}` });
    });

    // Socket inactivity deadline, longer than the tool-call timeout
    if (server instanceof Server) {
        server.setTimeout(config.requestTimeoutMs);
        server.requestTimeout = config.requestTimeoutMs;
    }

    return {
        app,
        server,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                server.close(error => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    logger.info('HTTP server stopped');
                    resolve();
                });
            }),
    };
}
