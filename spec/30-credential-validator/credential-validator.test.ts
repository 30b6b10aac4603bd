import { describe, expect, it, vi } from 'vitest';

import {
    CredentialValidator,
    isAuthFailure,
    isValidApiUrl,
    isValidJwtShape,
} from '@src/lib/credentials/credential-validator.js';
import { classifyValidationFailure } from '@src/lib/session/session-service.js';
import { TEST_API_URL, TEST_JWT, VALIDATION_BASE_URL, jsonResponse } from '@spec/helpers/credentials.js';
import { createTestLogger } from '@spec/helpers/test-logger.js';

function validatorWith(fetchImpl: typeof fetch, options: { baseUrl?: string; skipValidation?: boolean } = {}) {
    return new CredentialValidator({
        apiBaseUrl: options.baseUrl ?? VALIDATION_BASE_URL,
        timeoutMs: 5000,
        skipValidation: options.skipValidation ?? false,
        logger: createTestLogger(),
        fetch: fetchImpl,
    });
}

describe('credential shape', () => {
    it('should accept http and https URLs only', () => {
        expect(isValidApiUrl('https://tenant.analytics.test')).toBe(true);
        expect(isValidApiUrl('http://10.0.0.5:8080/api')).toBe(true);
        expect(isValidApiUrl('ftp://tenant.analytics.test')).toBe(false);
        expect(isValidApiUrl('tenant.analytics.test')).toBe(false);
    });

    it('should accept a three-segment token with JSON header and payload', () => {
        expect(isValidJwtShape(TEST_JWT)).toBe(true);
    });

    it('should reject tokens of the wrong shape', () => {
        expect(isValidJwtShape('not.a.jwt')).toBe(false);
        expect(isValidJwtShape('only-one-part')).toBe(false);
        expect(isValidJwtShape(`${TEST_JWT}.extra`)).toBe(false);
        expect(isValidJwtShape('WzFd.WzFd.sig')).toBe(false);
        expect(isValidJwtShape('a b.c.d')).toBe(false);
    });

    it('should spot authentication wording', () => {
        expect(isAuthFailure('Invalid credentials')).toBe(true);
        expect(isAuthFailure('HTTP 403')).toBe(true);
        expect(isAuthFailure('Token expired')).toBe(true);
        expect(isAuthFailure('Service unavailable')).toBe(false);
    });
});

describe('CredentialValidator', () => {
    it('should fail shape checks without calling the API', async () => {
        const fetchImpl = vi.fn<typeof fetch>();
        const validator = validatorWith(fetchImpl);

        expect(await validator.validate('not-a-url', TEST_JWT)).toEqual({
            ok: false,
            reason: 'Invalid API URL format',
            kind: 'shape',
        });
        expect(await validator.validate(TEST_API_URL, 'not.a.jwt')).toEqual({
            ok: false,
            reason: 'Invalid JWT token format',
            kind: 'shape',
        });
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should post the credentials to /settings/validate', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ status: 'success' }));
        const validator = validatorWith(fetchImpl, { baseUrl: `${VALIDATION_BASE_URL}/` });

        expect(await validator.validate(TEST_API_URL, TEST_JWT)).toEqual({ ok: true });

        expect(fetchImpl).toHaveBeenCalledTimes(1);
        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe('https://analytics.test/api/settings/validate');
        expect(init?.method).toBe('POST');
        expect(init?.body).toBe(JSON.stringify({ apiUrl: TEST_API_URL, jwtToken: TEST_JWT }));
    });

    it('should skip the remote check when configured to', async () => {
        const fetchImpl = vi.fn<typeof fetch>();

        expect(await validatorWith(fetchImpl, { skipValidation: true }).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: true,
        });
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should skip the remote check for a loopback API', async () => {
        const fetchImpl = vi.fn<typeof fetch>();

        const result = await validatorWith(fetchImpl, { baseUrl: 'http://localhost:8080' }).validate(
            TEST_API_URL,
            TEST_JWT
        );

        expect(result).toEqual({ ok: true });
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should take the reason from an HTTP error body', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'Invalid credentials' }, 403));

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Invalid credentials',
            kind: 'rejected',
        });
    });

    it('should fall back to the status text without a JSON body', async () => {
        const fetchImpl = vi
            .fn<typeof fetch>()
            .mockResolvedValue(new Response('upstream down', { status: 502, statusText: 'Bad Gateway' }));

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Bad Gateway',
            kind: 'rejected',
        });
    });

    it('should report an error status in a 200 body', async () => {
        const fetchImpl = vi
            .fn<typeof fetch>()
            .mockResolvedValue(jsonResponse({ status: 'error', error: 'Token expired' }));

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Token expired',
            kind: 'rejected',
        });
    });

    it('should treat an unexpected body as unreachable', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ ok: 1 }));

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Unexpected response from validation service',
            kind: 'unreachable',
        });
    });

    it('should report a network failure as unreachable', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Unable to reach validation service: fetch failed',
            kind: 'unreachable',
        });
    });

    it('should report a deadline overrun as a timeout', async () => {
        const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
        const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(timeout);

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Validation service timed out after 5s',
            kind: 'timeout',
        });
    });

    it('should report a deadline overrun while reading the body as a timeout', async () => {
        class StalledResponse extends Response {
            override json(): Promise<unknown> {
                const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
                return Promise.reject(timeout);
            }
        }
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new StalledResponse(null, { status: 200 }));

        expect(await validatorWith(fetchImpl).validate(TEST_API_URL, TEST_JWT)).toEqual({
            ok: false,
            reason: 'Validation service timed out after 5s',
            kind: 'timeout',
        });
    });
});

describe('classifyValidationFailure', () => {
    it('should answer 401 for shape and auth failures', () => {
        expect(classifyValidationFailure({ ok: false, reason: 'Invalid JWT token format', kind: 'shape' })).toMatchObject({
            statusCode: 401,
            errorCode: 'UNAUTHENTICATED',
            message: 'Invalid JWT token format',
        });
        expect(classifyValidationFailure({ ok: false, reason: 'Invalid credentials', kind: 'rejected' })).toMatchObject({
            statusCode: 401,
            errorCode: 'UNAUTHENTICATED',
        });
    });

    it('should answer 500 for backend failures', () => {
        expect(classifyValidationFailure({ ok: false, reason: 'Validation service timed out after 5s', kind: 'timeout' })).toMatchObject({
            statusCode: 500,
            errorCode: 'VALIDATION_TIMEOUT',
        });
        expect(classifyValidationFailure({ ok: false, reason: 'Service unavailable', kind: 'rejected' })).toMatchObject({
            statusCode: 500,
            errorCode: 'VALIDATION_UNREACHABLE',
        });
    });
});
