import type { Context } from 'hono';

import type { AppEnv } from '../../lib/services.js';

/**
 * GET /stats - Live session count and tracked sub-processes of this worker
 */
export default async function (context: Context<AppEnv>) {
    return context.json(await context.get('services').sessions.stats());
}
