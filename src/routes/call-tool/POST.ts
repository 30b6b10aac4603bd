import type { Context } from 'hono';

import { getBody, optionalObject, requireStrings } from '../../lib/api-helpers.js';
import type { AppEnv } from '../../lib/services.js';

/**
 * POST /call-tool - Invoke a tool within a session
 *
 * Body: { session_id, tool, params? }
 *
 * Credentials and cached workflow values are filled in for the tool; the answer is
 * the tool's own JSON minus its `intermediate` field.
 */
export default async function (context: Context<AppEnv>) {
    const body = getBody(context);
    const { session_id, tool } = requireStrings(body, ['session_id', 'tool']);
    const params = optionalObject(body, 'params');

    const result = await context.get('services').pipeline.callTool(session_id, tool, params);

    return context.json(result);
}
