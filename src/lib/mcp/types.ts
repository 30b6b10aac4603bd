/**
 * MCP Type Definitions
 */

// =============================================================================
// Tool Types
// =============================================================================

export interface ToolInputSchema {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
    [key: string]: unknown;
}

export interface ToolDescriptor {
    name: string;
    description?: string;
    inputSchema: ToolInputSchema;
    [key: string]: unknown;
}

// =============================================================================
// Supervisor Types
// =============================================================================

export type SupervisorState = 'new' | 'starting' | 'ready' | 'stopping' | 'stopped' | 'failed';

/**
 * The command line an MCP sub-process is started with: `<command> <args...> <serverScript>`
 */
export interface McpCommand {
    command: string;
    args: string[];
    serverScript: string;
}

export interface ProcessInfo {
    pid: number | null;
    createdAt: number;
    serverScript: string;
    isRunning: boolean;
}

/**
 * A sub-process tracked on behalf of a session, for orphan cleanup
 */
export interface TrackedProcess extends McpCommand {
    pid: number;
    createdAt: number;
}

export interface McpTimeouts {
    startMs: number;
    listMs: number;
    callMs: number;
    stopMs: number;
    terminateGraceMs: number;
}
