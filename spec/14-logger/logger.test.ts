import { afterEach, describe, expect, it, vi } from 'vitest';

import { HttpErrors } from '@src/lib/errors/http-error.js';
import { Logger, parseLogLevel } from '@src/lib/logger.js';

describe('parseLogLevel', () => {
    it('should accept level names in any case', () => {
        expect(parseLogLevel('debug')).toBe('DEBUG');
        expect(parseLogLevel(' Error ')).toBe('ERROR');
    });

    it('should treat WARNING as WARN', () => {
        expect(parseLogLevel('WARNING')).toBe('WARN');
    });

    it('should fall back for unknown or missing values', () => {
        expect(parseLogLevel('verbose')).toBe('INFO');
        expect(parseLogLevel(undefined, 'ERROR')).toBe('ERROR');
    });
});

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should prefix the scope and append metadata', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});

        new Logger({ level: 'INFO', scope: 'MCP SESSION' }).info('Created session s1', { ttl: 60 });

        expect(info).toHaveBeenCalledWith('INFO [MCP SESSION] Created session s1 {"ttl":60}');
    });

    it('should drop messages below the level', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        const logger = new Logger({ level: 'WARN' });
        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('WARN shown');
    });

    it('should describe errors in metadata', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        new Logger({ level: 'INFO' }).error('Call failed', { error: new Error('broken pipe') });

        expect(error).toHaveBeenCalledWith('ERROR Call failed {"error":{"name":"Error","message":"broken pipe"}}');
    });

    it('should keep stdout free when writing to stderr', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        new Logger({ level: 'INFO', stderr: true }).child('ANALYTICS MCP').info('ready');

        expect(info).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledWith('INFO [ANALYTICS MCP] ready');
    });
});

describe('HttpError', () => {
    it('should serialise to the error envelope', () => {
        expect(HttpErrors.sessionMissing('s1').toJSON()).toEqual({
            status: 'error',
            error: 'Session s1 not initialized or expired',
            error_code: 'SESSION_MISSING',
        });
        expect(HttpErrors.badRequest('Bad', { fields: ['tool'] }).toJSON()).toEqual({
            status: 'error',
            error: 'Bad',
            error_code: 'BAD_REQUEST',
            details: { fields: ['tool'] },
        });
    });

    it('should carry the status of its kind', () => {
        expect(HttpErrors.unauthenticated().statusCode).toBe(401);
        expect(HttpErrors.supervisorStartFailed('exited with code 1')).toMatchObject({
            statusCode: 500,
            message: 'MCP session failed to start: exited with code 1',
        });
        expect(HttpErrors.sessionNotReady().message).toBe('MCP session is not ready');
    });
});
