/**
 * Request Body Parser Middleware
 *
 * Every POST endpoint takes a JSON object. The body is parsed once here and set as
 * context.get('parsedBody') for route handlers to consume; an empty body becomes `{}`.
 *
 * The Content-Type header is not enforced: agents frequently omit it.
 */

import type { Context, Next } from 'hono';

import { HttpErrors } from '../errors/http-error.js';
import { isRecord } from '../session/json-value.js';
import type { AppEnv } from '../services.js';

export async function bodyParserMiddleware(context: Context<AppEnv>, next: Next) {
    // Skip parsing if no body (GET, DELETE, etc.)
    if (context.req.method === 'GET' || context.req.method === 'DELETE' || context.req.method === 'HEAD') {
        context.set('parsedBody', {});
        return await next();
    }

    const text = await context.req.text();
    if (text.trim().length === 0) {
        context.set('parsedBody', {});
        return await next();
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw HttpErrors.badRequest('Failed to parse request body as JSON', {
            reason: error instanceof Error ? error.message : 'Unknown error',
        });
    }

    if (!isRecord(parsed)) {
        throw HttpErrors.badRequest('Request body must be a JSON object');
    }

    context.set('parsedBody', parsed);
    return await next();
}
