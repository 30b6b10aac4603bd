/**
 * Orphan Reaper - background cleanup of MCP sub-processes
 *
 * Runs on an interval timer, the way the scheduler runs its ticks:
 *
 *   reaper.start();   // tick now, then every `intervalMs`
 *   reaper.stop();
 *   await reaper.shutdown();   // terminate everything still registered
 *
 * A tracked process is terminated only when its session is gone from Redis and its
 * command line still matches the MCP server. A failed Redis listing skips the tick.
 */

import { errorMessage } from '../errors/http-error.js';
import type { Logger } from '../logger.js';
import { terminateProcess, type ProcessControl } from './process-control.js';
import type { ProcessRegistry } from './process-registry.js';
import type { TrackedProcess } from './types.js';

export interface SessionLister {
    listSessionIds(): Promise<string[]>;
}

export interface OrphanReaperOptions {
    sessions: SessionLister;
    registry: ProcessRegistry;
    processControl: ProcessControl;
    intervalMs: number;
    terminateGraceMs: number;
    logger: Logger;
}

export interface ReapReport {
    checked: number;
    reaped: string[];
    skipped: string[];
}

export class OrphanReaper {
    private interval: NodeJS.Timeout | null = null;
    private running = false;

    constructor(private readonly options: OrphanReaperOptions) {}

    start(): void {
        if (this.interval) {
            return; // Already running
        }

        this.options.logger.info(`Starting orphan cleanup every ${this.options.intervalMs / 1000}s`);

        void this.tick();
        this.interval = setInterval(() => void this.tick(), this.options.intervalMs);
        this.interval.unref();
    }

    stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
            this.options.logger.info('Orphan cleanup stopped');
        }
    }

    /**
     * One sweep. Overlapping ticks are skipped rather than queued.
     */
    async tick(): Promise<ReapReport | null> {
        if (this.running) {
            return null; // Previous tick still running
        }

        this.running = true;
        try {
            return await this.sweep();
        } catch (error) {
            this.options.logger.error('Cleanup tick failed', { error: errorMessage(error) });
            return null;
        } finally {
            this.running = false;
        }
    }

    /**
     * Terminate every registered process regardless of session state
     */
    async shutdown(): Promise<void> {
        this.stop();

        const { registry, logger } = this.options;
        const entries = registry.entries();
        if (entries.length > 0) {
            logger.info(`Terminating ${entries.length} tracked MCP processes`);
        }

        await Promise.all(
            entries.map(async ([sessionId, info]) => {
                await this.terminate(sessionId, info);
                registry.unregister(sessionId, info.pid);
            })
        );
    }

    private async sweep(): Promise<ReapReport> {
        const { sessions, registry, logger } = this.options;
        const active = new Set(await sessions.listSessionIds());
        const report: ReapReport = { checked: 0, reaped: [], skipped: [] };

        for (const [sessionId, info] of registry.entries()) {
            report.checked += 1;
            if (active.has(sessionId)) {
                continue;
            }

            logger.info(`Session ${sessionId} expired, cleaning up PID ${info.pid}`);
            const outcome = await this.terminate(sessionId, info);
            if (outcome === 'skipped') {
                report.skipped.push(sessionId);
            } else {
                report.reaped.push(sessionId);
            }
            registry.unregister(sessionId, info.pid);
        }

        if (report.reaped.length > 0) {
            logger.info(`Cleaned up ${report.reaped.length} orphaned processes`);
        }
        return report;
    }

    private async terminate(sessionId: string, info: TrackedProcess) {
        const { processControl, terminateGraceMs, logger } = this.options;
        try {
            return await terminateProcess(info.pid, info, processControl, terminateGraceMs, logger);
        } catch (error) {
            logger.error(`Error killing orphaned process for session ${sessionId}`, { error: errorMessage(error) });
            return 'skipped' as const;
        }
    }
}
