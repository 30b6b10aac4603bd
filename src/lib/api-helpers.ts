import type { Context } from 'hono';

import type { AppEnv } from './services.js';
import { HttpErrors, isHttpError, type ErrorEnvelope } from './errors/http-error.js';
import { isRecord, type JsonRecord } from './session/json-value.js';

/**
 * API Request/Response Helpers
 *
 * Body field extraction for route handlers and the error envelope every failure
 * is answered with.
 */

// ===========================
// Request body helpers
// ===========================

/**
 * Parsed JSON body set by the body parser middleware (empty object when absent)
 */
export function getBody(context: Context<AppEnv>): JsonRecord {
    return context.get('parsedBody') ?? {};
}

/**
 * Collect the required string fields, failing with one message naming every missing one
 */
export function requireStrings(body: JsonRecord, fields: readonly string[]): Record<string, string> {
    const missing: string[] = [];
    const values: Record<string, string> = {};

    for (const field of fields) {
        const value = body[field];
        if (typeof value === 'string' && value.trim().length > 0) {
            values[field] = value;
        } else {
            missing.push(field);
        }
    }

    if (missing.length > 0) {
        throw HttpErrors.badRequest(`Missing or invalid required fields: ${missing.join(', ')}`, { fields: missing });
    }

    return values;
}

/**
 * Optional JSON object field; absent or null gives an empty object
 */
export function optionalObject(body: JsonRecord, field: string): JsonRecord {
    const value = body[field];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw HttpErrors.badRequest(`Field '${field}' must be a JSON object`, { fields: [field] });
    }
    return value;
}

// ===========================
// Error responses
// ===========================

/**
 * Answer any thrown value with the JSON error envelope
 *
 * HttpError keeps its status and code; anything else is a 500 INTERNAL_ERROR. In
 * development the stack is added under `details`.
 */
export function createErrorResponse(context: Context, error: unknown) {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const httpError = isHttpError(error)
        ? error
        : HttpErrors.internal(error instanceof Error ? error.message : 'Internal server error');

    const body: ErrorEnvelope = httpError.toJSON();

    if (isDevelopment && error instanceof Error) {
        body.details = {
            ...body.details,
            name: error.name,
            stack: error.stack,
        };
    }

    return context.json(body, httpError.statusCode);
}
