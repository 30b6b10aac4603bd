/**
 * Credential Validator
 *
 * Pre-flight check of an (apiUrl, jwtToken) pair before a session is created.
 * Shape checks run locally; everything else is decided by the analytics API's
 * `/settings/validate` endpoint under a short deadline.
 */

import type { Logger } from '../logger.js';
import { errorMessage } from '../errors/http-error.js';
import { isRecord } from '../session/json-value.js';

export type ValidationFailureKind = 'shape' | 'rejected' | 'timeout' | 'unreachable';

export type ValidationResult =
    | { ok: true }
    | { ok: false; reason: string; kind: ValidationFailureKind };

export interface CredentialValidatorOptions {
    apiBaseUrl: string;
    timeoutMs: number;
    skipValidation?: boolean;
    logger: Logger;
    fetch?: typeof fetch;
}

export const INVALID_URL_REASON = 'Invalid API URL format';
export const INVALID_JWT_REASON = 'Invalid JWT token format';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1', '[::1]', '0.0.0.0']);
const AUTH_KEYWORDS = ['forbidden', '403', 'authentication', 'credentials', 'token'];
const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+={0,2}$/;

/**
 * http(s) URL with a non-empty host
 */
export function isValidApiUrl(value: string): boolean {
    let url: URL;
    try {
        url = new URL(value);
    } catch {
        return false;
    }
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.host.length > 0;
}

/**
 * Three base64url segments, the first two of which decode to JSON objects
 */
export function isValidJwtShape(token: string): boolean {
    const parts = token.split('.');
    if (parts.length !== 3 || parts.some(part => !BASE64URL_SEGMENT.test(part))) {
        return false;
    }

    return parts.slice(0, 2).every(part => {
        try {
            const decoded: unknown = JSON.parse(Buffer.from(part, 'base64url').toString('utf-8'));
            return isRecord(decoded);
        } catch {
            return false;
        }
    });
}

/**
 * Whether a rejection reason reads like an authentication failure
 */
export function isAuthFailure(reason: string): boolean {
    const lower = reason.toLowerCase();
    return AUTH_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function isLoopbackUrl(value: string): boolean {
    try {
        return LOOPBACK_HOSTS.has(new URL(value).hostname);
    } catch {
        return false;
    }
}

export class CredentialValidator {
    private readonly apiBaseUrl: string;
    private readonly timeoutMs: number;
    private readonly skipValidation: boolean;
    private readonly logger: Logger;
    private readonly fetchImpl: typeof fetch;

    constructor(options: CredentialValidatorOptions) {
        this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.skipValidation = options.skipValidation ?? false;
        this.logger = options.logger;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async validate(apiUrl: string, jwtToken: string): Promise<ValidationResult> {
        if (!isValidApiUrl(apiUrl)) {
            return { ok: false, reason: INVALID_URL_REASON, kind: 'shape' };
        }
        if (!isValidJwtShape(jwtToken)) {
            return { ok: false, reason: INVALID_JWT_REASON, kind: 'shape' };
        }

        if (this.skipValidation) {
            this.logger.debug('Credential validation skipped by configuration');
            return { ok: true };
        }
        if (isLoopbackUrl(this.apiBaseUrl)) {
            this.logger.debug('Credential validation skipped for loopback API');
            return { ok: true };
        }

        return this.remoteValidate(apiUrl, jwtToken);
    }

    private async remoteValidate(apiUrl: string, jwtToken: string): Promise<ValidationResult> {
        const url = `${this.apiBaseUrl}/settings/validate`;
        const seconds = Math.round(this.timeoutMs / 100) / 10;

        let response: Response;
        let body: unknown;
        try {
            response = await this.fetchImpl(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
                body: JSON.stringify({ apiUrl, jwtToken }),
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            // The deadline covers reading the body too
            body = await readJson(response);
        } catch (error) {
            if (isAbortError(error)) {
                this.logger.warn(`Validation service timed out after ${seconds}s`);
                return { ok: false, reason: `Validation service timed out after ${seconds}s`, kind: 'timeout' };
            }
            this.logger.warn('Validation service unreachable', { error: errorMessage(error) });
            return {
                ok: false,
                reason: `Unable to reach validation service: ${errorMessage(error)}`,
                kind: 'unreachable',
            };
        }

        if (response.status >= 400) {
            const reason = isRecord(body) && typeof body.error === 'string' ? body.error : response.statusText || `HTTP ${response.status}`;
            return { ok: false, reason, kind: 'rejected' };
        }

        if (isRecord(body) && body.status === 'success') {
            return { ok: true };
        }
        if (isRecord(body) && body.status === 'error') {
            const reason = typeof body.error === 'string' ? body.error : 'Validation failed';
            return { ok: false, reason, kind: 'rejected' };
        }

        return { ok: false, reason: 'Unexpected response from validation service', kind: 'unreachable' };
    }
}

async function readJson(response: Response): Promise<unknown> {
    try {
        return await response.json();
    } catch (error) {
        if (isAbortError(error)) {
            throw error;
        }
        return null;
    }
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
