/**
 * HttpError - Structured HTTP error handling for bridge responses
 *
 * Business logic throws semantic errors, the HTTP layer maps them to a status and
 * the shared JSON envelope: `{ status: 'error', error, error_code, details? }`.
 */

export type HttpStatus = 400 | 401 | 403 | 404 | 405 | 409 | 413 | 415 | 422 | 500 | 501 | 503 | 504;

export type ErrorCode =
    | 'BAD_REQUEST'
    | 'UNAUTHENTICATED'
    | 'NOT_FOUND'
    | 'SESSION_MISSING'
    | 'VALIDATION_UNREACHABLE'
    | 'VALIDATION_TIMEOUT'
    | 'SUPERVISOR_START_FAILED'
    | 'SESSION_NOT_READY'
    | 'TOOL_FAILED'
    | 'CHANNEL_TIMEOUT'
    | 'CHANNEL_ERROR'
    | 'INTERNAL_ERROR';

export interface ErrorEnvelope {
    status: 'error';
    error: string;
    error_code: ErrorCode;
    details?: Record<string, unknown>;
}

export class HttpError extends Error {
    public readonly name = 'HttpError';

    constructor(
        public readonly statusCode: HttpStatus,
        message: string,
        public readonly errorCode: ErrorCode,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, HttpError.prototype);
    }

    toJSON(): ErrorEnvelope {
        return {
            status: 'error',
            error: this.message,
            error_code: this.errorCode,
            ...(this.details ? { details: this.details } : {}),
        };
    }
}

/**
 * Factory methods for the bridge's error kinds
 */
export class HttpErrors {
    static badRequest(message: string, details?: Record<string, unknown>) {
        return new HttpError(400, message, 'BAD_REQUEST', details);
    }

    static unauthenticated(message = 'Authentication failed') {
        return new HttpError(401, message, 'UNAUTHENTICATED');
    }

    static notFound(message = 'Not found') {
        return new HttpError(404, message, 'NOT_FOUND');
    }

    static sessionMissing(sessionId: string) {
        return new HttpError(409, `Session ${sessionId} not initialized or expired`, 'SESSION_MISSING');
    }

    static validationUnreachable(message: string) {
        return new HttpError(500, message, 'VALIDATION_UNREACHABLE');
    }

    static validationTimeout(message: string) {
        return new HttpError(500, message, 'VALIDATION_TIMEOUT');
    }

    static supervisorStartFailed(message: string) {
        return new HttpError(500, `MCP session failed to start: ${message}`, 'SUPERVISOR_START_FAILED');
    }

    static sessionNotReady(reason?: string) {
        const suffix = reason ? `: ${reason}` : '';
        return new HttpError(500, `MCP session is not ready${suffix}`, 'SESSION_NOT_READY');
    }

    static toolFailed(message: string, details?: Record<string, unknown>) {
        return new HttpError(500, message, 'TOOL_FAILED', details);
    }

    static channelTimeout(message: string) {
        return new HttpError(500, message, 'CHANNEL_TIMEOUT');
    }

    static channelError(message: string) {
        return new HttpError(500, message, 'CHANNEL_ERROR');
    }

    static internal(message = 'Internal server error') {
        return new HttpError(500, message, 'INTERNAL_ERROR');
    }
}

/**
 * Type guard for HttpError instances
 */
export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
