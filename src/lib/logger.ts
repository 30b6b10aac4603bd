/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * Scoped children prefix every line with the component name, e.g. `[MCP SESSION]`.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARN: 30,
    ERROR: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
    const upper = (value ?? '').trim().toUpperCase();
    if (upper === 'WARNING') return 'WARN';
    if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
        return upper;
    }
    return fallback;
}

export interface LoggerOptions {
    level?: LogLevel;
    scope?: string;
    /** Send every level to stderr; stdio MCP servers keep stdout for the protocol */
    stderr?: boolean;
}

export class Logger {
    private readonly level: LogLevel;
    private readonly scope?: string;
    private readonly stderr: boolean;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? parseLogLevel(process.env.MCP_LOG_LEVEL);
        this.scope = options.scope;
        this.stderr = options.stderr ?? false;
    }

    /**
     * Create a logger that prefixes every message with `[scope]`
     */
    child(scope: string): Logger {
        return new Logger({ level: this.level, scope, stderr: this.stderr });
    }

    debug(message: string, meta?: unknown) {
        if (this.enabled('DEBUG')) {
            this.out(this.formatLog('DEBUG', message, meta));
        }
    }

    info(message: string, meta?: unknown) {
        if (this.enabled('INFO')) {
            this.out(this.formatLog('INFO', message, meta));
        }
    }

    warn(message: string, meta?: unknown) {
        if (this.enabled('WARN')) {
            console.warn(this.formatLog('WARN', message, meta));
        }
    }

    /**
     * Log failure message with context
     */
    fail(message: string, meta?: unknown) {
        if (this.enabled('ERROR')) {
            console.error(this.formatLog('FAIL', message, meta));
        }
    }

    error(message: string, meta?: unknown) {
        if (this.enabled('ERROR')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: Record<string, unknown> = {}): void {
        if (!this.enabled('DEBUG')) {
            return;
        }
        const durationNs = process.hrtime.bigint() - startTime;
        const durationMs = Number(durationNs) / 1_000_000;
        this.out(this.formatLog('TIME', `${label} ${durationMs}ms`, meta));
    }

    private out(line: string): void {
        if (this.stderr) {
            console.error(line);
        } else {
            console.info(line);
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: unknown): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return safeStringify({
                timestamp: new Date().toISOString(),
                level,
                ...(this.scope ? { scope: this.scope } : {}),
                message,
                ...(meta !== undefined ? { meta: describeMeta(meta) } : {}),
            });
        }

        const scope = this.scope ? ` [${this.scope}]` : '';
        const metaStr = meta !== undefined ? ` ${safeStringify(describeMeta(meta))}` : '';
        return `${level}${scope} ${message}${metaStr}`;
    }
}

/**
 * Errors do not survive JSON.stringify, and a bigint throws
 */
function describeMeta(meta: unknown): unknown {
    if (meta instanceof Error) {
        return { name: meta.name, message: meta.message };
    }
    if (typeof meta === 'bigint') {
        return meta.toString();
    }
    if (meta !== null && typeof meta === 'object' && !Array.isArray(meta)) {
        const out: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(meta)) {
            out[key] = value instanceof Error || typeof value === 'bigint' ? describeMeta(value) : value;
        }
        return out;
    }
    return meta;
}

function safeStringify(value: unknown): string {
    try {
        return JSON.stringify(value) ?? 'undefined';
    } catch {
        return '"[unserializable]"';
    }
}
