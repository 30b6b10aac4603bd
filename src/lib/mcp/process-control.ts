/**
 * Process inspection and signalling for MCP sub-processes
 *
 * Every signal sent by the supervisor or the orphan reaper goes through
 * terminateProcess(), which refuses to touch a PID whose command line does not
 * look like the configured MCP server.
 */

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { promisify } from 'node:util';

import type { Logger } from '../logger.js';
import type { McpCommand } from './types.js';

const execFileAsync = promisify(execFile);

const POLL_INTERVAL_MS = 100;

export interface ProcessControl {
    /** False for missing and zombie processes */
    isAlive(pid: number): Promise<boolean>;
    /** Argument vector of the process, or null when it cannot be read */
    commandLine(pid: number): Promise<string[] | null>;
    /** False when the process no longer exists */
    signal(pid: number, signal: NodeJS.Signals): boolean;
}

export type TerminateOutcome = 'gone' | 'skipped' | 'terminated' | 'killed';

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * ProcessControl backed by kill(2) and /proc, with `ps` where /proc is missing
 */
export class SystemProcessControl implements ProcessControl {
    constructor(private readonly procRoot = '/proc') {}

    async isAlive(pid: number): Promise<boolean> {
        try {
            process.kill(pid, 0);
        } catch (error) {
            // EPERM: exists but belongs to someone else
            if (errorCode(error) !== 'EPERM') {
                return false;
            }
        }

        return !(await this.isZombie(pid));
    }

    async commandLine(pid: number): Promise<string[] | null> {
        try {
            const raw = await readFile(`${this.procRoot}/${pid}/cmdline`, 'utf-8');
            const argv = raw.split('\0').filter(part => part.length > 0);
            return argv.length > 0 ? argv : null;
        } catch (error) {
            if (errorCode(error) !== 'ENOENT' || (await this.hasProcFs())) {
                return null;
            }
        }

        try {
            const { stdout } = await execFileAsync('ps', ['-o', 'command=', '-p', String(pid)]);
            const argv = stdout.trim().split(/\s+/).filter(part => part.length > 0);
            return argv.length > 0 ? argv : null;
        } catch {
            return null;
        }
    }

    signal(pid: number, signal: NodeJS.Signals): boolean {
        try {
            process.kill(pid, signal);
            return true;
        } catch (error) {
            if (errorCode(error) === 'ESRCH') {
                return false;
            }
            throw error;
        }
    }

    private async isZombie(pid: number): Promise<boolean> {
        try {
            const state = processState(await readFile(`${this.procRoot}/${pid}/stat`, 'utf-8'));
            return state === 'Z' || state === 'X';
        } catch {
            return false;
        }
    }

    private async hasProcFs(): Promise<boolean> {
        try {
            await readFile(`${this.procRoot}/self/stat`, 'utf-8');
            return true;
        } catch {
            return false;
        }
    }
}

/**
 * State letter of a /proc/<pid>/stat line; it follows the parenthesised command name,
 * which may itself contain parentheses and spaces
 */
export function processState(stat: string): string {
    const end = stat.lastIndexOf(')');
    return end === -1 ? '' : stat.slice(end + 2, end + 3);
}

/**
 * Whether an argument vector belongs to the configured MCP server
 */
export function matchesMcpCommand(argv: string[], expected: McpCommand): boolean {
    const commandName = basename(expected.command);
    const hasCommand = argv.some(arg => arg.includes(commandName));
    const hasArgs = expected.args.every(arg => argv.includes(arg));
    const hasScript = argv.some(arg => arg.includes(expected.serverScript));
    return hasCommand && hasArgs && hasScript;
}

export function describeCommand(command: McpCommand): string {
    return [command.command, ...command.args, command.serverScript].join(' ');
}

/**
 * SIGTERM, wait up to `graceMs`, then SIGKILL
 *
 * Only a live process whose command line matches `expected` is signalled.
 */
export async function terminateProcess(
    pid: number,
    expected: McpCommand,
    control: ProcessControl,
    graceMs: number,
    logger: Logger
): Promise<TerminateOutcome> {
    if (!(await control.isAlive(pid))) {
        return 'gone';
    }

    const argv = await control.commandLine(pid);
    if (!argv || !matchesMcpCommand(argv, expected)) {
        logger.warn(`Process PID ${pid} doesn't match expected MCP command line, skipping`, {
            expected: describeCommand(expected),
        });
        return 'skipped';
    }

    if (!control.signal(pid, 'SIGTERM')) {
        return 'gone';
    }

    const deadline = Date.now() + graceMs;
    while (await control.isAlive(pid)) {
        if (Date.now() >= deadline) {
            control.signal(pid, 'SIGKILL');
            logger.warn(`Force killed process PID ${pid}`);
            return 'killed';
        }
        await sleep(POLL_INTERVAL_MS);
    }

    logger.info(`Terminated process PID ${pid}`);
    return 'terminated';
}
