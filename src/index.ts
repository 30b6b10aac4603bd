/**
 * MCP Analytics Bridge - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - Redis connection
 * - Service wiring (session store, supervisors, pipeline)
 * - Orphan cleanup and HTTP server startup
 * - Graceful shutdown coordination
 */

import { loadEnv } from './lib/env/load-env.js';

// Load .env, then the environment-specific file on top of it
loadEnv({
    paths: ['.env', ...(process.env.NODE_ENV ? [`.env.${process.env.NODE_ENV}`] : [])],
    debug: process.env.MCP_LOG_LEVEL?.toUpperCase() === 'DEBUG',
});

import { loadBridgeConfig, validateBridgeConfig } from './lib/config.js';
import { CredentialValidator } from './lib/credentials/credential-validator.js';
import { errorMessage } from './lib/errors/http-error.js';
import { Logger } from './lib/logger.js';
import { OrphanReaper, ProcessRegistry, SupervisorFactory, SystemProcessControl } from './lib/mcp/index.js';
import { InvocationPipeline } from './lib/pipeline/invocation-pipeline.js';
import { createRedisClient } from './lib/session/redis-client.js';
import { SessionService } from './lib/session/session-service.js';
import { SessionStore } from './lib/session/session-store.js';
import { loadWorkflowGuidance } from './lib/workflow/guidance.js';
import { startHttpServer } from './servers/http.js';

const config = loadBridgeConfig(process.env);

// Sanity check for required env values
const problems = validateBridgeConfig(config);
if (problems.length > 0) {
    throw Error(`Fatal: ${problems.join('; ')}`);
}

const logger = new Logger({ level: config.logging.level });

logger.info('Starting MCP analytics bridge');
logger.info('Configuration', {
    NODE_ENV: process.env.NODE_ENV,
    redis: `${config.redis.host}:${config.redis.port}/${config.redis.db}`,
    api: config.api.baseUrl,
    server: `${config.server.host}:${config.server.port}`,
    mcp: [config.mcp.command, ...config.mcp.args, config.mcp.serverScript].join(' '),
    idleTtl: config.session.idleTtlSeconds,
});

const redis = createRedisClient(config.redis, logger.child('REDIS'));
const processControl = new SystemProcessControl();
const registry = new ProcessRegistry(logger.child('MCP SESSION'));

const store = new SessionStore(redis, {
    idleTtlSeconds: config.session.idleTtlSeconds,
    keyPrefix: config.session.keyPrefix,
    logger: logger.child('MCP SESSION'),
    trackedProcesses: () => registry.size,
});

// Redis is the only shared state; refuse to start without it
try {
    await redis.connect();
    await store.ping();
} catch (error) {
    throw Error(`Fatal: cannot reach Redis at ${config.redis.host}:${config.redis.port}: ${errorMessage(error)}`);
}

const supervisors = new SupervisorFactory({
    command: {
        command: config.mcp.command,
        args: config.mcp.args,
        serverScript: config.mcp.serverScript,
    },
    timeouts: {
        startMs: config.mcp.sessionStartTimeoutMs,
        listMs: config.mcp.toolListTimeoutMs,
        callMs: config.mcp.toolCallTimeoutMs,
        stopMs: config.mcp.sessionStopTimeoutMs,
        terminateGraceMs: config.mcp.terminateGraceMs,
    },
    store,
    registry,
    processControl,
    logger,
    // The tool server reads the same API settings
    env: {
        ANALYTICS_API_URL: config.api.baseUrl,
        MCP_API_DEFAULT_TIMEOUT: String(config.api.defaultTimeoutMs / 1000),
        MCP_API_LONG_TIMEOUT: String(config.api.longTimeoutMs / 1000),
        MCP_LOG_LEVEL: config.logging.level,
    },
});

const validator = new CredentialValidator({
    apiBaseUrl: config.api.baseUrl,
    timeoutMs: config.api.validationTimeoutMs,
    skipValidation: config.security.skipCredentialValidation,
    logger: logger.child('VALIDATION'),
});

const sessions = new SessionService({
    store,
    validator,
    registry,
    logger: logger.child('MCP SESSION'),
    ...(config.mcp.initProbe ? { probe: (sessionId: string) => supervisors.forSession(sessionId) } : {}),
});

const pipeline = new InvocationPipeline({
    store,
    supervisors,
    sensitiveParams: config.security.sensitiveParams,
    schemaCacheTtlMs: config.tools.schemaCacheTtlMs,
    logger: logger.child('PIPELINE'),
});

const reaper = new OrphanReaper({
    sessions: store,
    registry,
    processControl,
    intervalMs: config.session.cleanupIntervalSeconds * 1000,
    terminateGraceMs: config.mcp.terminateGraceMs,
    logger: logger.child('MCP CLEANUP'),
});

const httpServer = startHttpServer(
    {
        sessions,
        pipeline,
        guidance: loadWorkflowGuidance(),
        logger: logger.child('HTTP'),
    },
    config.server
);

reaper.start();

// Graceful shutdown
let shuttingDown = false;
const gracefulShutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully`);

    try {
        await httpServer.stop();
    } catch (error) {
        logger.warn('Error stopping HTTP server', error);
    }

    // Kill every child still tracked, then release Redis
    await reaper.shutdown();
    await store.close();

    process.exit(0);
};

process.on('SIGINT', signal => void gracefulShutdown(signal));
process.on('SIGTERM', signal => void gracefulShutdown(signal));
