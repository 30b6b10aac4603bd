import type { Context } from 'hono';

/**
 * GET /health - Health check endpoint
 *
 * Liveness only: answers without touching Redis or spawning anything.
 */
export default function (context: Context) {
    return context.json({ status: 'ok' });
}
