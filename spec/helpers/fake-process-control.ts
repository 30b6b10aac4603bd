import type { ProcessControl } from '@src/lib/mcp/process-control.js';

export interface FakeProcess {
    argv: string[];
    alive: boolean;
    /** Ignores SIGTERM, so only SIGKILL ends it */
    stubborn?: boolean;
}

/**
 * Process table stand-in; records every signal instead of sending it
 */
export class FakeProcessControl implements ProcessControl {
    readonly processes = new Map<number, FakeProcess>();
    readonly signals: Array<[number, NodeJS.Signals]> = [];

    spawn(pid: number, argv: string[], options: { stubborn?: boolean } = {}): void {
        this.processes.set(pid, { argv, alive: true, ...(options.stubborn ? { stubborn: true } : {}) });
    }

    async isAlive(pid: number): Promise<boolean> {
        return this.processes.get(pid)?.alive ?? false;
    }

    async commandLine(pid: number): Promise<string[] | null> {
        const entry = this.processes.get(pid);
        return entry?.alive ? [...entry.argv] : null;
    }

    signal(pid: number, signal: NodeJS.Signals): boolean {
        const entry = this.processes.get(pid);
        if (!entry?.alive) {
            return false;
        }

        this.signals.push([pid, signal]);
        if (signal === 'SIGKILL' || !entry.stubborn) {
            entry.alive = false;
        }
        return true;
    }

    signalsFor(pid: number): NodeJS.Signals[] {
        return this.signals.filter(([target]) => target === pid).map(([, signal]) => signal);
    }
}
