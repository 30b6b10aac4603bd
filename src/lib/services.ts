import type { Logger } from './logger.js';
import type { InvocationPipeline } from './pipeline/invocation-pipeline.js';
import type { JsonRecord } from './session/json-value.js';
import type { SessionService } from './session/session-service.js';
import type { WorkflowGuidance } from './workflow/guidance.js';

/**
 * Process-wide services, built once at startup and handed to every request
 */
export interface BridgeServices {
    sessions: SessionService;
    pipeline: InvocationPipeline;
    guidance: WorkflowGuidance;
    logger: Logger;
}

export type AppEnv = {
    Variables: {
        services: BridgeServices;
        parsedBody: JsonRecord;
    };
};
