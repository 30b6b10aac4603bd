import type { Context } from 'hono';

import { getBody, requireStrings } from '../../lib/api-helpers.js';
import type { AppEnv } from '../../lib/services.js';

/**
 * POST /init - Open (or reuse) a session
 *
 * Body: { session_id, apiUrl, jwtToken, ...extra }
 *
 * An existing session is reused without validating the credentials again. A new one
 * is created only after the credentials pass validation; every body field except
 * `session_id` is stored in it.
 */
export default async function (context: Context<AppEnv>) {
    const body = getBody(context);
    const fields = requireStrings(body, ['session_id', 'apiUrl', 'jwtToken']);

    const { session_id: _sessionId, ...extra } = body;

    await context.get('services').sessions.initialize({
        sessionId: fields.session_id,
        apiUrl: fields.apiUrl,
        jwtToken: fields.jwtToken,
        extra,
    });

    return context.json({ status: 'ok' });
}
