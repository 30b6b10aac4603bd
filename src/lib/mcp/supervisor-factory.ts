import type { Logger } from '../logger.js';
import type { SessionStore } from '../session/session-store.js';
import type { ProcessControl } from './process-control.js';
import type { ProcessRegistry } from './process-registry.js';
import { McpSupervisor, type ChannelFactory } from './supervisor.js';
import type { McpCommand, McpTimeouts } from './types.js';

export interface SupervisorFactoryOptions {
    command: McpCommand;
    timeouts: McpTimeouts;
    store: SessionStore;
    registry: ProcessRegistry;
    processControl: ProcessControl;
    logger: Logger;
    env?: Record<string, string>;
    channelFactory?: ChannelFactory;
}

/**
 * Creates started supervisors; session-bound ones are tracked for orphan cleanup
 */
export class SupervisorFactory {
    constructor(private readonly options: SupervisorFactoryOptions) {}

    /**
     * Start a supervisor for a live session, or null when the session is gone
     */
    async forSession(sessionId: string): Promise<McpSupervisor | null> {
        const { store, registry, logger } = this.options;

        if (!(await store.touch(sessionId))) {
            logger.warn(`Session ${sessionId} not found or expired`);
            return null;
        }

        let registeredPid: number | null = null;
        const supervisor = this.build(logger.child(`MCP CLIENT ${sessionId}`), () => {
            if (registeredPid !== null) {
                registry.unregister(sessionId, registeredPid);
            }
        });

        await supervisor.start();

        const info = supervisor.processInfo();
        if (info.pid !== null) {
            registeredPid = info.pid;
            registry.register(sessionId, {
                pid: info.pid,
                createdAt: info.createdAt,
                command: this.options.command.command,
                args: this.options.command.args,
                serverScript: info.serverScript,
            });
        }

        return supervisor;
    }

    /**
     * Start a supervisor that belongs to no session (schema discovery)
     */
    async anonymous(): Promise<McpSupervisor> {
        const supervisor = this.build(this.options.logger.child('MCP CLIENT'));
        await supervisor.start();
        return supervisor;
    }

    private build(logger: Logger, onStopped?: () => void): McpSupervisor {
        const { command, timeouts, processControl, env, channelFactory } = this.options;
        return new McpSupervisor({
            command,
            timeouts,
            processControl,
            logger,
            ...(env ? { env } : {}),
            ...(channelFactory ? { channelFactory } : {}),
            ...(onStopped ? { onStopped } : {}),
        });
    }
}
