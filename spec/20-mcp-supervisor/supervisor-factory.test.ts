import { beforeEach, describe, expect, it } from 'vitest';

import { ProcessRegistry } from '@src/lib/mcp/process-registry.js';
import { SupervisorFactory } from '@src/lib/mcp/supervisor-factory.js';
import { SessionStore } from '@src/lib/session/session-store.js';
import { FakeMcpServers, SAMPLE_TOOLS, TEST_COMMAND } from '@spec/helpers/fake-mcp-server.js';
import { FakeProcessControl } from '@spec/helpers/fake-process-control.js';
import { FakeRedis } from '@spec/helpers/fake-redis.js';
import { createTestLogger } from '@spec/helpers/test-logger.js';

describe('SupervisorFactory', () => {
    let redis: FakeRedis;
    let store: SessionStore;
    let registry: ProcessRegistry;
    let servers: FakeMcpServers;
    let factory: SupervisorFactory;

    beforeEach(() => {
        const logger = createTestLogger();
        const processes = new FakeProcessControl();
        redis = new FakeRedis();
        store = new SessionStore(redis, { idleTtlSeconds: 60, keyPrefix: 'mcp_session', logger });
        registry = new ProcessRegistry(logger);
        servers = new FakeMcpServers({ tools: SAMPLE_TOOLS, processes, firstPid: 7000 });
        factory = new SupervisorFactory({
            command: TEST_COMMAND,
            timeouts: { startMs: 1000, listMs: 1000, callMs: 1000, stopMs: 500, terminateGraceMs: 300 },
            store,
            registry,
            processControl: processes,
            logger,
            channelFactory: servers.factory,
        });
    });

    it('should track a session supervisor until it stops', async () => {
        await store.create('s1', {});

        const supervisor = await factory.forSession('s1');

        expect(supervisor?.state).toBe('ready');
        expect(registry.get('s1')).toMatchObject({ pid: 7000, ...TEST_COMMAND });

        await supervisor?.stop();
        expect(registry.get('s1')).toBeUndefined();
    });

    it('should refresh the session TTL when starting', async () => {
        await store.create('s1', {});
        redis.advance(50);

        const supervisor = await factory.forSession('s1');

        expect(await store.ttl('s1')).toBe(60);
        await supervisor?.stop();
    });

    it('should return null without spawning for a missing session', async () => {
        expect(await factory.forSession('missing')).toBeNull();
        expect(servers.spawned).toBe(0);
    });

    it('should not track anonymous supervisors', async () => {
        const supervisor = await factory.anonymous();

        expect(await supervisor.listTools()).toEqual(['list_sources', 'generate_strategy']);
        expect(registry.size).toBe(0);

        await supervisor.stop();
    });

    it('should keep a newer registration when an older supervisor stops', async () => {
        await store.create('s1', {});
        const older = await factory.forSession('s1');
        const newer = await factory.forSession('s1');

        await older?.stop();

        expect(registry.get('s1')?.pid).toBe(7001);
        await newer?.stop();
        expect(registry.size).toBe(0);
    });
});
