import type { Context } from 'hono';

import type { AppEnv } from '../../lib/services.js';

/**
 * GET /tools-schema - Anonymous tool discovery
 *
 * Descriptors come from a short-lived MCP server with credential properties removed,
 * along with the system description an agent shows before authentication.
 */
export default async function (context: Context<AppEnv>) {
    const { pipeline, guidance } = context.get('services');
    const tools = await pipeline.describeTools();

    return context.json({
        status: 'success',
        tools,
        system_info: guidance.systemInfo,
    });
}
