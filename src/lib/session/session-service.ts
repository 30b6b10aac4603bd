/**
 * Session lifecycle behind `/init`, `/shutdown` and `/stats`
 */

import type { CredentialValidator, ValidationResult } from '../credentials/credential-validator.js';
import { isAuthFailure } from '../credentials/credential-validator.js';
import { HttpErrors, errorMessage, type HttpError } from '../errors/http-error.js';
import type { Logger } from '../logger.js';
import type { ProcessRegistry } from '../mcp/process-registry.js';
import type { JsonRecord } from './json-value.js';
import type { SessionStats, SessionStore } from './session-store.js';

export interface ProbeSupervisor {
    listTools(): Promise<string[]>;
    stop(): Promise<void>;
}

export interface SessionServiceOptions {
    store: SessionStore;
    validator: CredentialValidator;
    registry: ProcessRegistry;
    logger: Logger;
    /** Set when a supervisor should be started and listed right after creation */
    probe?: (sessionId: string) => Promise<ProbeSupervisor | null>;
}

export interface InitRequest {
    sessionId: string;
    apiUrl: string;
    jwtToken: string;
    /** Any further body fields, stored as-is */
    extra?: JsonRecord;
}

export type InitOutcome = 'existing' | 'created';

export class SessionService {
    constructor(private readonly options: SessionServiceOptions) {}

    /**
     * Create a session after validating its credentials; an existing session is
     * only touched, without validating again
     */
    async initialize(request: InitRequest): Promise<InitOutcome> {
        const { store, validator, logger } = this.options;
        const { sessionId, apiUrl, jwtToken } = request;

        if (await store.exists(sessionId)) {
            await store.touch(sessionId);
            logger.info(`Session ${sessionId} already exists, reusing it`);
            return 'existing';
        }

        const validation = await validator.validate(apiUrl, jwtToken);
        if (!validation.ok) {
            logger.warn(`Credential validation failed for session ${sessionId}: ${validation.reason}`);
            throw classifyValidationFailure(validation);
        }

        const created = await store.create(sessionId, { ...request.extra, apiUrl, jwtToken });
        if (!created) {
            throw HttpErrors.internal(`Failed to create session ${sessionId}`);
        }

        if (this.options.probe) {
            await this.runProbe(sessionId, this.options.probe);
        }

        return 'created';
    }

    /**
     * Forget the session and its tracked process; succeeds when nothing was there
     */
    async terminate(sessionId: string): Promise<void> {
        this.options.registry.unregister(sessionId);
        await this.options.store.delete(sessionId);
        this.options.logger.info(`Session ${sessionId} shut down`);
    }

    stats(): Promise<SessionStats> {
        return this.options.store.stats();
    }

    private async runProbe(
        sessionId: string,
        probe: (sessionId: string) => Promise<ProbeSupervisor | null>
    ): Promise<void> {
        const { store, logger } = this.options;

        let supervisor: ProbeSupervisor | null;
        try {
            supervisor = await probe(sessionId);
        } catch (error) {
            logger.error(`MCP session failed to start for ${sessionId}, removing session`, {
                error: errorMessage(error),
            });
            await store.delete(sessionId);
            throw error;
        }

        if (!supervisor) {
            return;
        }

        try {
            const tools = await supervisor.listTools();
            logger.info(`Session ${sessionId} ready with ${tools.length} tools`);
        } finally {
            await supervisor.stop();
        }
    }
}

/**
 * Auth-shaped reasons become 401; the rest are backend failures (500)
 */
export function classifyValidationFailure(validation: Exclude<ValidationResult, { ok: true }>): HttpError {
    const { reason, kind } = validation;

    if (kind === 'shape' || isAuthFailure(reason)) {
        return HttpErrors.unauthenticated(reason);
    }
    if (kind === 'timeout') {
        return HttpErrors.validationTimeout(reason);
    }
    // Unreachable, or rejected without an auth keyword
    return HttpErrors.validationUnreachable(reason);
}
