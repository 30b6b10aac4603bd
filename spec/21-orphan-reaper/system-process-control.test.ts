import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { processState, SystemProcessControl } from '@src/lib/mcp/process-control.js';

// Above the largest pid_max Linux allows
const MISSING_PID = 4_194_305;

const HAS_PS = existsSync('/bin/ps') || existsSync('/usr/bin/ps');

describe('SystemProcessControl', () => {
    describe('against the real process table', () => {
        const control = new SystemProcessControl();

        it('should report the test process alive with a command line', async () => {
            expect(await control.isAlive(process.pid)).toBe(true);
            expect((await control.commandLine(process.pid))?.length).toBeGreaterThan(0);
        });

        it('should report a missing pid as dead', async () => {
            expect(await control.isAlive(MISSING_PID)).toBe(false);
            expect(await control.commandLine(MISSING_PID)).toBeNull();
            expect(control.signal(MISSING_PID, 'SIGTERM')).toBe(false);
        });

        it('should count a process it may not signal as alive', async () => {
            expect(await control.isAlive(1)).toBe(true);
        });
    });

    describe('with a prepared proc directory', () => {
        let root: string;

        beforeEach(async () => {
            root = await mkdtemp(join(tmpdir(), 'proc-'));
            await mkdir(join(root, 'self'));
            await writeFile(join(root, 'self', 'stat'), '1 (vitest) S 0');
            await mkdir(join(root, String(process.pid)));
        });

        afterEach(async () => {
            await rm(root, { recursive: true, force: true });
        });

        async function writeEntry(file: 'cmdline' | 'stat', content: string) {
            await writeFile(join(root, String(process.pid), file), content);
        }

        it('should split cmdline on NUL bytes', async () => {
            await writeEntry('cmdline', 'node\0--no-warnings\0/opt/app/dist/mcp-server/main.js\0');

            expect(await new SystemProcessControl(root).commandLine(process.pid)).toEqual([
                'node',
                '--no-warnings',
                '/opt/app/dist/mcp-server/main.js',
            ]);
        });

        it('should return null for an empty cmdline', async () => {
            await writeEntry('cmdline', '');

            expect(await new SystemProcessControl(root).commandLine(process.pid)).toBeNull();
        });

        it('should return null without asking ps when the pid has no entry', async () => {
            expect(await new SystemProcessControl(root).commandLine(MISSING_PID)).toBeNull();
        });

        it('should treat a zombie as dead', async () => {
            const control = new SystemProcessControl(root);

            await writeEntry('stat', `${process.pid} (node) S 1 1 1`);
            expect(await control.isAlive(process.pid)).toBe(true);

            await writeEntry('stat', `${process.pid} (node (worker) x) Z 1 1 1`);
            expect(await control.isAlive(process.pid)).toBe(false);
        });

        it.skipIf(!HAS_PS)('should fall back to ps without a proc filesystem', async () => {
            const bare = await mkdtemp(join(tmpdir(), 'noproc-'));
            try {
                const argv = await new SystemProcessControl(bare).commandLine(process.pid);
                expect(argv?.length).toBeGreaterThan(0);
            } finally {
                await rm(bare, { recursive: true, force: true });
            }
        });
    });
});

describe('processState', () => {
    it('should read the letter after the command name', () => {
        expect(processState('42 (node) S 1 42 42')).toBe('S');
        expect(processState('42 (odd) name) Z 1 42 42')).toBe('Z');
    });

    it('should return an empty string for a malformed line', () => {
        expect(processState('garbage')).toBe('');
    });
});
