import type { Context, Next } from 'hono';

import type { AppEnv } from '../services.js';

/**
 * Log method, path, status and duration of every request
 */
export async function requestLoggerMiddleware(context: Context<AppEnv>, next: Next) {
    const start = Date.now();
    const method = context.req.method;
    const path = context.req.path;

    await next();

    const duration = Date.now() - start;
    const status = context.res.status;

    context.get('services').logger.info('Request completed', { method, path, status, duration });
}
