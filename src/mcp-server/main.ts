#!/usr/bin/env node

/**
 * Analytics MCP server over stdio. Spawned by the bridge, one process per
 * supervisor; stdout carries the protocol, so logs go to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadEnv } from '../lib/env/load-env.js';
import { Logger, parseLogLevel } from '../lib/logger.js';
import { createAnalyticsToolServer } from './analytics-server.js';

loadEnv({ paths: ['.env'] });

const logger = new Logger({
    level: parseLogLevel(process.env.MCP_LOG_LEVEL),
    scope: 'ANALYTICS MCP',
    stderr: true,
});

const baseUrl = process.env.ANALYTICS_API_URL;
if (!baseUrl) {
    throw new Error('Fatal: environment is missing "ANALYTICS_API_URL"');
}

function seconds(name: string, fallback: number): number {
    const value = Number(process.env[name]);
    return (Number.isFinite(value) && value > 0 ? value : fallback) * 1000;
}

const server = createAnalyticsToolServer({
    baseUrl,
    defaultTimeoutMs: seconds('MCP_API_DEFAULT_TIMEOUT', 60),
    longTimeoutMs: seconds('MCP_API_LONG_TIMEOUT', 300),
    logger,
});

await server.connect(new StdioServerTransport());
logger.info('Analytics MCP server running on stdio', { api: baseUrl });
