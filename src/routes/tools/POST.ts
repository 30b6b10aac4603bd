import type { Context } from 'hono';

import { getBody, requireStrings } from '../../lib/api-helpers.js';
import type { AppEnv } from '../../lib/services.js';

/**
 * POST /tools - Tools available to a session, with workflow guidance
 */
export default async function (context: Context<AppEnv>) {
    const { session_id } = requireStrings(getBody(context), ['session_id']);
    const { pipeline, guidance } = context.get('services');

    const tools = await pipeline.listTools(session_id);

    return context.json({
        tools,
        workflow_guidance: guidance.workflowGuidance,
    });
}
