/**
 * Bridge configuration
 *
 * Every knob is read from the environment once, at startup, and the resulting
 * BridgeConfig is injected into the services that need it.
 */

import { parseLogLevel, type LogLevel } from './logger.js';

export interface RedisConfig {
    host: string;
    port: number;
    db: number;
    password?: string;
    connectTimeoutMs: number;
    socketTimeoutMs: number;
}

export interface SessionConfig {
    idleTtlSeconds: number;
    keyPrefix: string;
    cleanupIntervalSeconds: number;
}

export interface ServerConfig {
    host: string;
    port: number;
    requestTimeoutMs: number;
}

export interface ApiConfig {
    baseUrl: string;
    defaultTimeoutMs: number;
    longTimeoutMs: number;
    validationTimeoutMs: number;
}

export interface SecurityConfig {
    sensitiveParams: string[];
    skipCredentialValidation: boolean;
}

export interface McpConfig {
    command: string;
    args: string[];
    serverScript: string;
    toolCallTimeoutMs: number;
    sessionStartTimeoutMs: number;
    toolListTimeoutMs: number;
    sessionStopTimeoutMs: number;
    terminateGraceMs: number;
    initProbe: boolean;
}

export interface ToolsConfig {
    schemaCacheTtlMs: number;
}

export interface BridgeConfig {
    redis: RedisConfig;
    session: SessionConfig;
    server: ServerConfig;
    api: ApiConfig;
    security: SecurityConfig;
    mcp: McpConfig;
    tools: ToolsConfig;
    logging: { level: LogLevel };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
    const value = env[key];
    return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    return Number.isFinite(value) ? value : NaN;
}

function readSeconds(env: Env, key: string, fallbackSeconds: number): number {
    return readNumber(env, key, fallbackSeconds) * 1000;
}

function readBoolean(env: Env, key: string, fallback = false): boolean {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function readList(env: Env, key: string, fallback: string[]): string[] {
    const raw = env[key];
    if (raw === undefined) {
        return fallback;
    }
    return raw
        .split(/[,\s]+/)
        .map(item => item.trim())
        .filter(item => item.length > 0);
}

/**
 * Build the configuration from an environment map
 */
export function loadBridgeConfig(env: Env = process.env): BridgeConfig {
    const password = env.REDIS_PASSWORD;

    return {
        redis: {
            host: readString(env, 'REDIS_HOST', 'localhost'),
            port: readNumber(env, 'REDIS_PORT', 6379),
            db: readNumber(env, 'REDIS_DB', 0),
            ...(password ? { password } : {}),
            connectTimeoutMs: readSeconds(env, 'REDIS_CONNECT_TIMEOUT', 5),
            socketTimeoutMs: readSeconds(env, 'REDIS_SOCKET_TIMEOUT', 5),
        },
        session: {
            idleTtlSeconds: readNumber(env, 'MCP_SESSION_IDLE_TTL', 86400),
            keyPrefix: readString(env, 'MCP_SESSION_KEY_PREFIX', 'mcp_session'),
            cleanupIntervalSeconds: readNumber(env, 'MCP_CLEANUP_INTERVAL', 60),
        },
        server: {
            host: readString(env, 'MCP_CLIENT_HOST', '0.0.0.0'),
            port: readNumber(env, 'MCP_CLIENT_PORT', 33000),
            requestTimeoutMs: readSeconds(env, 'MCP_REQUEST_TIMEOUT', 330),
        },
        api: {
            baseUrl: readString(env, 'ANALYTICS_API_URL', ''),
            defaultTimeoutMs: readSeconds(env, 'MCP_API_DEFAULT_TIMEOUT', 60),
            longTimeoutMs: readSeconds(env, 'MCP_API_LONG_TIMEOUT', 300),
            validationTimeoutMs: readSeconds(env, 'MCP_API_VALIDATION_TIMEOUT', 5),
        },
        security: {
            sensitiveParams: readList(env, 'MCP_SENSITIVE_PARAMS', ['apiUrl', 'jwtToken']),
            skipCredentialValidation: readBoolean(env, 'MCP_SKIP_CREDENTIAL_VALIDATION'),
        },
        mcp: {
            command: readString(env, 'MCP_SERVER_COMMAND', 'node'),
            args: readList(env, 'MCP_SERVER_ARGS', []),
            serverScript: readString(env, 'MCP_SERVER_SCRIPT', 'dist/mcp-server/main.js'),
            toolCallTimeoutMs: readSeconds(env, 'MCP_TOOL_CALL_TIMEOUT', 310),
            sessionStartTimeoutMs: readSeconds(env, 'MCP_SESSION_START_TIMEOUT', 30),
            toolListTimeoutMs: readSeconds(env, 'MCP_TOOL_LIST_TIMEOUT', 30),
            sessionStopTimeoutMs: readSeconds(env, 'MCP_SESSION_STOP_TIMEOUT', 10),
            terminateGraceMs: readSeconds(env, 'MCP_PROCESS_TERMINATE_GRACE', 5),
            initProbe: readBoolean(env, 'MCP_INIT_PROBE'),
        },
        tools: {
            schemaCacheTtlMs: readSeconds(env, 'MCP_TOOLS_SCHEMA_CACHE_TTL', 300),
        },
        logging: {
            level: parseLogLevel(env.MCP_LOG_LEVEL),
        },
    };
}

function isPort(value: number): boolean {
    return Number.isInteger(value) && value >= 1 && value <= 65535;
}

function isUrl(value: string): boolean {
    try {
        new URL(value);
        return true;
    } catch {
        return false;
    }
}

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

/**
 * Return every problem found in the configuration (empty when valid)
 */
export function validateBridgeConfig(config: BridgeConfig): string[] {
    const problems: string[] = [];

    if (!config.redis.host) {
        problems.push('REDIS_HOST must not be empty');
    }
    if (!isPort(config.redis.port)) {
        problems.push(`REDIS_PORT must be between 1 and 65535 (got ${config.redis.port})`);
    }
    if (!Number.isInteger(config.redis.db) || config.redis.db < 0) {
        problems.push(`REDIS_DB must be a non-negative integer (got ${config.redis.db})`);
    }
    if (!isPort(config.server.port)) {
        problems.push(`MCP_CLIENT_PORT must be between 1 and 65535 (got ${config.server.port})`);
    }
    if (!Number.isInteger(config.session.idleTtlSeconds) || config.session.idleTtlSeconds <= 0) {
        problems.push('MCP_SESSION_IDLE_TTL must be a positive integer');
    }
    if (!config.session.keyPrefix) {
        problems.push('MCP_SESSION_KEY_PREFIX must not be empty');
    }
    if (!isPositive(config.session.cleanupIntervalSeconds)) {
        problems.push('MCP_CLEANUP_INTERVAL must be positive');
    }

    if (!config.api.baseUrl) {
        problems.push('environment is missing "ANALYTICS_API_URL"');
    } else if (!isUrl(config.api.baseUrl)) {
        problems.push(`ANALYTICS_API_URL is not a valid URL: ${config.api.baseUrl}`);
    }

    const deadlines: Array<[string, number]> = [
        ['REDIS_CONNECT_TIMEOUT', config.redis.connectTimeoutMs],
        ['REDIS_SOCKET_TIMEOUT', config.redis.socketTimeoutMs],
        ['MCP_REQUEST_TIMEOUT', config.server.requestTimeoutMs],
        ['MCP_API_DEFAULT_TIMEOUT', config.api.defaultTimeoutMs],
        ['MCP_API_LONG_TIMEOUT', config.api.longTimeoutMs],
        ['MCP_API_VALIDATION_TIMEOUT', config.api.validationTimeoutMs],
        ['MCP_TOOL_CALL_TIMEOUT', config.mcp.toolCallTimeoutMs],
        ['MCP_SESSION_START_TIMEOUT', config.mcp.sessionStartTimeoutMs],
        ['MCP_TOOL_LIST_TIMEOUT', config.mcp.toolListTimeoutMs],
        ['MCP_SESSION_STOP_TIMEOUT', config.mcp.sessionStopTimeoutMs],
        ['MCP_PROCESS_TERMINATE_GRACE', config.mcp.terminateGraceMs],
    ];
    for (const [key, value] of deadlines) {
        if (!isPositive(value)) {
            problems.push(`${key} must be a positive number of seconds`);
        }
    }
    if (!(config.tools.schemaCacheTtlMs >= 0)) {
        problems.push('MCP_TOOLS_SCHEMA_CACHE_TTL must be zero or positive');
    }

    if (!config.mcp.command) {
        problems.push('MCP_SERVER_COMMAND must not be empty');
    }
    if (!config.mcp.serverScript) {
        problems.push('MCP_SERVER_SCRIPT must not be empty');
    }

    return problems;
}
