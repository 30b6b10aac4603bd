import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { matchesMcpCommand, SystemProcessControl } from '@src/lib/mcp/process-control.js';
import { McpSupervisor } from '@src/lib/mcp/supervisor.js';
import type { McpCommand, McpTimeouts } from '@src/lib/mcp/types.js';
import { createTestLogger } from '@spec/helpers/test-logger.js';

const TIMEOUTS: McpTimeouts = {
    startMs: 20_000,
    listMs: 10_000,
    callMs: 10_000,
    stopMs: 5_000,
    terminateGraceMs: 2_000,
};

function fixture(name: string): McpCommand {
    return {
        command: process.execPath,
        args: [],
        serverScript: fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)),
    };
}

function supervisorFor(command: McpCommand, control: SystemProcessControl) {
    return new McpSupervisor({ command, timeouts: TIMEOUTS, processControl: control, logger: createTestLogger() });
}

describe('McpSupervisor over a real stdio sub-process', () => {
    it('should track the live process and leave nothing behind after stop', async () => {
        const command = fixture('echo-mcp-server.mjs');
        const control = new SystemProcessControl();
        const supervisor = supervisorFor(command, control);

        await supervisor.start();
        const { pid, isRunning } = supervisor.processInfo();
        if (pid === null) {
            throw new Error('supervisor reported no pid');
        }

        expect(isRunning).toBe(true);
        expect(await control.isAlive(pid)).toBe(true);
        expect(await supervisor.isProcessRunning()).toBe(true);
        expect(matchesMcpCommand((await control.commandLine(pid)) ?? [], command)).toBe(true);

        expect(await supervisor.listTools()).toEqual(['echo']);
        expect(await supervisor.callTool('echo', { text: 'hi' })).toEqual({
            status: 'success',
            echoed: { text: 'hi' },
        });

        await supervisor.stop();

        expect(supervisor.state).toBe('stopped');
        expect(await control.isAlive(pid)).toBe(false);
        expect(await control.commandLine(pid)).toBeNull();
    });

    it('should fail the start as soon as the sub-process exits', async () => {
        const supervisor = supervisorFor(fixture('exit-immediately.mjs'), new SystemProcessControl());
        const startedAt = Date.now();

        await expect(supervisor.start()).rejects.toMatchObject({
            statusCode: 500,
            errorCode: 'SUPERVISOR_START_FAILED',
        });

        expect(Date.now() - startedAt).toBeLessThan(TIMEOUTS.startMs);
        expect(supervisor.state).toBe('failed');
        await supervisor.stop();
    });
});
