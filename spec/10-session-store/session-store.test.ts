import { beforeEach, describe, expect, it } from 'vitest';

import { SessionStore } from '@src/lib/session/session-store.js';
import { FakeRedis } from '@spec/helpers/fake-redis.js';
import { createTestLogger } from '@spec/helpers/test-logger.js';

const STAMP = '2026-03-01T12:00:00.000Z';

describe('SessionStore', () => {
    let redis: FakeRedis;
    let store: SessionStore;
    let tracked: number;

    beforeEach(() => {
        redis = new FakeRedis();
        tracked = 0;
        store = new SessionStore(redis, {
            idleTtlSeconds: 60,
            keyPrefix: 'mcp_session',
            logger: createTestLogger(),
            trackedProcesses: () => tracked,
            now: () => new Date(STAMP),
        });
    });

    describe('create and get', () => {
        it('should stamp bookkeeping fields on create', async () => {
            expect(await store.create('s1', { apiUrl: 'https://api.test', jwtToken: 'a.b.c' })).toBe(true);

            expect(await store.get('s1')).toEqual({
                apiUrl: 'https://api.test',
                jwtToken: 'a.b.c',
                session_id: 's1',
                created_at: STAMP,
                last_accessed: STAMP,
            });
        });

        it('should store the record under <prefix>:<session_id>', async () => {
            await store.create('s1', { apiUrl: 'https://api.test' });

            const raw = redis.raw('mcp_session:s1');
            expect(raw).not.toBeNull();
            expect(JSON.parse(raw ?? '{}').session_id).toBe('s1');
        });

        it('should not let the data override the session id', async () => {
            await store.create('s1', { session_id: 'other' });

            const record = await store.get('s1');
            expect(record?.session_id).toBe('s1');
        });

        it('should return null for an unknown session', async () => {
            expect(await store.get('missing')).toBeNull();
        });
    });

    describe('sliding TTL', () => {
        it('should expire an idle session after the TTL', async () => {
            await store.create('s1', {});

            redis.advance(61);

            expect(await store.get('s1')).toBeNull();
            expect(await store.exists('s1')).toBe(false);
        });

        it('should reset the TTL on get', async () => {
            await store.create('s1', {});

            redis.advance(50);
            expect(await store.get('s1')).not.toBeNull();
            expect(await store.ttl('s1')).toBe(60);

            redis.advance(50);
            expect(await store.get('s1')).not.toBeNull();
        });

        it('should reset the TTL on update', async () => {
            await store.create('s1', {});

            redis.advance(45);
            expect(await store.update('s1', { question: 'why' })).toBe(true);

            expect(await store.ttl('s1')).toBe(60);
        });

        it('should reset the TTL on touch without rewriting the value', async () => {
            await store.create('s1', { question: 'why' });
            const before = redis.raw('mcp_session:s1');

            redis.advance(40);
            expect(await store.touch('s1')).toBe(true);

            expect(await store.ttl('s1')).toBe(60);
            expect(redis.raw('mcp_session:s1')).toBe(before);
        });

        it('should leave the TTL alone on exists and ttl', async () => {
            await store.create('s1', {});

            redis.advance(30);
            expect(await store.exists('s1')).toBe(true);
            expect(await store.ttl('s1')).toBe(30);

            redis.advance(31);
            expect(await store.exists('s1')).toBe(false);
        });

        it('should report -2 for a missing key', async () => {
            expect(await store.ttl('missing')).toBe(-2);
        });
    });

    describe('update', () => {
        it('should shallow-merge the patch', async () => {
            await store.create('s1', { apiUrl: 'https://api.test', question: 'first' });

            await store.update('s1', { question: 'second', strategy: { steps: 2 } });

            const record = await store.get('s1');
            expect(record?.apiUrl).toBe('https://api.test');
            expect(record?.question).toBe('second');
            expect(record?.strategy).toEqual({ steps: 2 });
        });

        it('should refuse to update a missing session', async () => {
            expect(await store.update('missing', { question: 'x' })).toBe(false);
            expect(await store.exists('missing')).toBe(false);
        });
    });

    describe('touch and delete', () => {
        it('should report false when touching a missing session', async () => {
            expect(await store.touch('missing')).toBe(false);
        });

        it('should delete a session and report whether it existed', async () => {
            await store.create('s1', {});

            expect(await store.delete('s1')).toBe(true);
            expect(await store.delete('s1')).toBe(false);
            expect(await store.get('s1')).toBeNull();
        });
    });

    describe('corrupt records', () => {
        it('should delete a value that is not JSON', async () => {
            redis.seed('mcp_session:bad', '{not json', 60);

            expect(await store.get('bad')).toBeNull();
            expect(redis.raw('mcp_session:bad')).toBeNull();
        });

        it('should delete JSON that is not an object', async () => {
            redis.seed('mcp_session:list', '[1,2,3]', 60);

            expect(await store.get('list')).toBeNull();
            expect(redis.raw('mcp_session:list')).toBeNull();
        });
    });

    describe('Redis failures', () => {
        beforeEach(async () => {
            await store.create('s1', {});
            redis.failWith = new Error('connect ECONNREFUSED');
        });

        it('should degrade each operation to its failure value', async () => {
            expect(await store.create('s2', {})).toBe(false);
            expect(await store.get('s1')).toBeNull();
            expect(await store.update('s1', { a: 1 })).toBe(false);
            expect(await store.touch('s1')).toBe(false);
            expect(await store.delete('s1')).toBe(false);
            expect(await store.exists('s1')).toBe(false);
            expect(await store.ttl('s1')).toBe(-2);
        });

        it('should throw from listSessionIds', async () => {
            await expect(store.listSessionIds()).rejects.toThrow('connect ECONNREFUSED');
        });

        it('should throw from ping', async () => {
            await expect(store.ping()).rejects.toThrow('connect ECONNREFUSED');

            redis.failWith = null;
            await expect(store.ping()).resolves.toBeUndefined();
        });

        it('should report zero sessions in stats', async () => {
            tracked = 2;
            expect(await store.stats()).toEqual({
                redis_sessions: 0,
                tracked_processes: 2,
                architecture: 'redis_with_process_tracking',
            });
        });
    });

    describe('listing and stats', () => {
        it('should list ids under the prefix only', async () => {
            await store.create('s1', {});
            await store.create('s2', {});
            redis.seed('other_prefix:s3', '{}');

            expect((await store.listSessionIds()).sort()).toEqual(['s1', 's2']);
        });

        it('should count live sessions and tracked processes', async () => {
            await store.create('s1', {});
            await store.create('s2', {});
            tracked = 1;

            expect(await store.stats()).toEqual({
                redis_sessions: 2,
                tracked_processes: 1,
                architecture: 'redis_with_process_tracking',
            });
        });
    });
});
