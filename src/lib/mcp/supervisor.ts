/**
 * MCP Supervisor
 *
 * Owns one MCP server sub-process for the duration of a single request:
 *
 *   new -> starting -> ready -> stopping -> stopped
 *                 \-> failed
 *
 * The sub-process speaks MCP over stdio. list/schema/call operations share that one
 * channel and run strictly one at a time, each under its own deadline. stop() is
 * idempotent and always releases the sub-process, falling back to SIGTERM/SIGKILL
 * when the client does not close in time.
 */

import type { Stream } from 'node:stream';

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError, type Tool } from '@modelcontextprotocol/sdk/types.js';

import { HttpErrors, errorMessage, isHttpError, type HttpError } from '../errors/http-error.js';
import type { Logger } from '../logger.js';
import type { JsonRecord, JsonValue } from '../session/json-value.js';
import { ChannelLock } from './channel-lock.js';
import { describeCommand, terminateProcess, type ProcessControl } from './process-control.js';
import { decodeToolResult } from './tool-result.js';
import type { McpCommand, McpTimeouts, ProcessInfo, SupervisorState, ToolDescriptor } from './types.js';

/**
 * A transport plus whatever is known about the process behind it
 */
export interface McpChannel {
    transport: Transport;
    pid(): number | null;
    stderr(): Stream | null;
}

export type ChannelFactory = (command: McpCommand, env: Record<string, string>) => McpChannel;

/**
 * Spawn `<command> <args...> <serverScript>` with stdio as the MCP channel
 */
export const stdioChannelFactory: ChannelFactory = (command, env) => {
    const transport = new StdioClientTransport({
        command: command.command,
        args: [...command.args, command.serverScript],
        env,
        stderr: 'pipe',
    });

    return {
        transport,
        pid: () => transport.pid,
        stderr: () => transport.stderr,
    };
};

export interface McpSupervisorOptions {
    command: McpCommand;
    timeouts: McpTimeouts;
    processControl: ProcessControl;
    logger: Logger;
    /** Variables added on top of the inherited environment */
    env?: Record<string, string>;
    channelFactory?: ChannelFactory;
    /** Called once, after the supervisor reached `stopped` */
    onStopped?: (supervisor: McpSupervisor) => void;
}

const CLIENT_INFO = { name: 'mcp-analytics-bridge', version: '1.0.0' };

export class McpSupervisor {
    private readonly command: McpCommand;
    private readonly timeouts: McpTimeouts;
    private readonly processControl: ProcessControl;
    private readonly logger: Logger;
    private readonly extraEnv: Record<string, string>;
    private readonly channelFactory: ChannelFactory;
    private readonly onStopped?: (supervisor: McpSupervisor) => void;
    private readonly lock = new ChannelLock();

    private currentState: SupervisorState = 'new';
    private client: Client | null = null;
    private pid: number | null = null;
    private createdAt = 0;
    private failure: string | null = null;
    private toolNames: string[] | null = null;
    private startPromise: Promise<void> | null = null;
    private stopPromise: Promise<void> | null = null;

    constructor(options: McpSupervisorOptions) {
        this.command = options.command;
        this.timeouts = options.timeouts;
        this.processControl = options.processControl;
        this.logger = options.logger;
        this.extraEnv = options.env ?? {};
        this.channelFactory = options.channelFactory ?? stdioChannelFactory;
        this.onStopped = options.onStopped;
    }

    get state(): SupervisorState {
        return this.currentState;
    }

    /**
     * Spawn the sub-process and complete the MCP handshake
     *
     * Resolves once the supervisor is ready. An early exit of the sub-process fails
     * the start immediately; a silent hang fails it at the start deadline.
     */
    start(): Promise<void> {
        if (!this.startPromise) {
            this.startPromise = this.doStart();
        }
        return this.startPromise;
    }

    /**
     * Names of the tools the server offers; cached for the supervisor's lifetime
     */
    async listTools(): Promise<string[]> {
        if (this.toolNames) {
            return [...this.toolNames];
        }
        const tools = await this.fetchTools('list tools');
        this.toolNames = tools.map(tool => tool.name);
        return [...this.toolNames];
    }

    /**
     * Full tool descriptors, always fetched from the sub-process
     */
    getToolSchemas(): Promise<ToolDescriptor[]> {
        return this.fetchTools('get tool schemas');
    }

    async callTool(name: string, args: JsonRecord): Promise<JsonValue> {
        const result = await this.exclusive(`call tool ${name}`, this.timeouts.callMs, (client, options) =>
            client.callTool({ name, arguments: args }, undefined, options)
        );
        return decodeToolResult(name, result);
    }

    stop(): Promise<void> {
        if (!this.stopPromise) {
            this.stopPromise = this.doStop();
        }
        return this.stopPromise;
    }

    processInfo(): ProcessInfo {
        return {
            pid: this.pid,
            createdAt: this.createdAt,
            serverScript: this.command.serverScript,
            isRunning: this.currentState === 'ready',
        };
    }

    async isProcessRunning(): Promise<boolean> {
        return this.pid !== null && (await this.processControl.isAlive(this.pid));
    }

    private async doStart(): Promise<void> {
        if (this.currentState !== 'new') {
            throw HttpErrors.sessionNotReady(this.currentState);
        }

        this.currentState = 'starting';
        this.createdAt = Date.now();
        this.logger.info(`Starting MCP server: ${describeCommand(this.command)}`);

        const channel = this.channelFactory(this.command, this.buildEnv());
        const client = new Client(CLIENT_INFO);
        this.client = client;

        client.onerror = error => {
            this.logger.warn('MCP channel error', { error: error.message });
        };
        client.onclose = () => this.handleClose();

        let stderrAttached = this.attachStderr(channel);

        try {
            await withDeadline(
                client.connect(channel.transport),
                this.timeouts.startMs,
                () => new Error(`Timed out after ${seconds(this.timeouts.startMs)}s waiting for MCP session to start`)
            );
        } catch (error) {
            this.pid = this.pid ?? channel.pid();
            if (this.currentState === 'starting') {
                this.currentState = 'failed';
            }
            this.failure = errorMessage(error);
            this.logger.error('MCP server failed to start', { error: this.failure });
            await this.teardown();
            throw HttpErrors.supervisorStartFailed(this.failure);
        }

        this.pid = channel.pid();
        stderrAttached = stderrAttached || this.attachStderr(channel);

        if (this.currentState !== 'starting') {
            // stop() won the race, or the channel closed right after the handshake
            throw HttpErrors.sessionNotReady(this.failure ?? this.currentState);
        }

        this.currentState = 'ready';
        this.logger.info('MCP session ready', { pid: this.pid, stderr: stderrAttached });
    }

    private async doStop(): Promise<void> {
        const previous = this.currentState;
        if (previous !== 'new') {
            this.currentState = 'stopping';
            await this.teardown();
        }

        this.currentState = 'stopped';
        this.toolNames = null;
        if (previous !== 'new') {
            this.logger.info('MCP session stopped', { pid: this.pid });
        }

        try {
            this.onStopped?.(this);
        } catch (error) {
            this.logger.warn('Stop callback failed', error);
        }
    }

    /**
     * Close the client, then make sure the sub-process is gone. Failures are logged only.
     */
    private async teardown(): Promise<void> {
        const client = this.client;
        this.client = null;

        if (client) {
            try {
                await withDeadline(
                    client.close(),
                    this.timeouts.stopMs,
                    () => new Error(`Timed out after ${seconds(this.timeouts.stopMs)}s closing MCP client`)
                );
            } catch (error) {
                this.logger.warn('Error closing MCP client', { error: errorMessage(error) });
            }
        }

        if (this.pid === null) {
            return;
        }

        try {
            await terminateProcess(this.pid, this.command, this.processControl, this.timeouts.terminateGraceMs, this.logger);
        } catch (error) {
            this.logger.warn(`Error terminating MCP process PID ${this.pid}`, { error: errorMessage(error) });
        }
    }

    private handleClose(): void {
        if (this.currentState === 'ready' || this.currentState === 'starting') {
            this.failure = 'MCP channel closed';
            this.logger.warn('MCP channel closed unexpectedly', { pid: this.pid });
            if (this.currentState === 'ready') {
                this.currentState = 'failed';
            }
        }
    }

    private fetchTools(operation: string): Promise<ToolDescriptor[]> {
        return this.exclusive(operation, this.timeouts.listMs, async (client, options) => {
            const result = await client.listTools(undefined, options);
            return result.tools.map(toDescriptor);
        });
    }

    /**
     * Run one request/response exchange under the channel lock
     */
    private exclusive<T>(
        operation: string,
        timeoutMs: number,
        exchange: (client: Client, options: RequestOptions) => Promise<T>
    ): Promise<T> {
        return this.lock.run(async () => {
            const client = this.client;
            if (this.currentState !== 'ready' || !client) {
                throw HttpErrors.sessionNotReady(this.failure ?? this.currentState);
            }

            const startTime = process.hrtime.bigint();
            try {
                return await exchange(client, { timeout: timeoutMs });
            } catch (error) {
                throw this.classify(operation, timeoutMs, error);
            } finally {
                this.logger.time(operation, startTime);
            }
        });
    }

    private classify(operation: string, timeoutMs: number, error: unknown): HttpError {
        if (isHttpError(error)) {
            return error;
        }
        if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) {
            return HttpErrors.channelTimeout(`Timed out after ${seconds(timeoutMs)}s waiting to ${operation}`);
        }

        const message = errorMessage(error);
        this.logger.error(`Failed to ${operation}`, { error: message });
        return operation.startsWith('call tool')
            ? HttpErrors.toolFailed(message)
            : HttpErrors.channelError(`Failed to ${operation}: ${message}`);
    }

    private buildEnv(): Record<string, string> {
        const env: Record<string, string> = {};
        for (const [key, value] of Object.entries(process.env)) {
            if (value !== undefined) {
                env[key] = value;
            }
        }
        return { ...env, ...this.extraEnv };
    }

    private attachStderr(channel: McpChannel): boolean {
        const stream = channel.stderr();
        if (!stream) {
            return false;
        }

        stream.on('data', (chunk: Buffer) => {
            for (const line of chunk.toString('utf-8').split('\n')) {
                if (line.trim()) {
                    this.logger.debug(`[stderr] ${line.trimEnd()}`);
                }
            }
        });
        return true;
    }
}

function toDescriptor(tool: Tool): ToolDescriptor {
    return { ...tool, inputSchema: { ...tool.inputSchema } };
}

function seconds(ms: number): number {
    return Math.round(ms / 100) / 10;
}

/**
 * Reject with `onTimeout()` when `promise` has not settled after `ms`
 */
export function withDeadline<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), ms);
    });
    return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}
