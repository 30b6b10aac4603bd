import type { Context } from 'hono';

import { getBody, requireStrings } from '../../lib/api-helpers.js';
import type { AppEnv } from '../../lib/services.js';

/**
 * POST /shutdown - Forget a session
 *
 * Succeeds whether or not the session still existed.
 */
export default async function (context: Context<AppEnv>) {
    const { session_id } = requireStrings(getBody(context), ['session_id']);

    await context.get('services').sessions.terminate(session_id);

    return context.json({ status: 'ok', message: `Session ${session_id} shut down` });
}
