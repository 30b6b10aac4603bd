import type { Context, Next } from 'hono';

import type { AppEnv, BridgeServices } from '../services.js';

/**
 * Expose the process-wide services as context.get('services')
 */
export function servicesMiddleware(services: BridgeServices) {
    return async (context: Context<AppEnv>, next: Next) => {
        context.set('services', services);
        return await next();
    };
}
