import type { Logger } from '../logger.js';
import type { TrackedProcess } from './types.js';

/**
 * Session id -> MCP sub-process spawned on its behalf by this worker
 */
export class ProcessRegistry {
    private readonly processes = new Map<string, TrackedProcess>();

    constructor(private readonly logger: Logger) {}

    register(sessionId: string, info: TrackedProcess): void {
        this.processes.set(sessionId, { ...info, args: [...info.args] });
        this.logger.info(`Registered process for session ${sessionId}: PID ${info.pid}`);
    }

    /**
     * Drop the entry; with `pid`, only when it still points at that process
     */
    unregister(sessionId: string, pid?: number): TrackedProcess | undefined {
        const info = this.processes.get(sessionId);
        if (!info || (pid !== undefined && info.pid !== pid)) {
            return undefined;
        }

        this.processes.delete(sessionId);
        this.logger.info(`Unregistered process for session ${sessionId}: PID ${info.pid}`);
        return info;
    }

    get(sessionId: string): TrackedProcess | undefined {
        return this.processes.get(sessionId);
    }

    entries(): Array<[string, TrackedProcess]> {
        return [...this.processes.entries()];
    }

    get size(): number {
        return this.processes.size;
    }
}
