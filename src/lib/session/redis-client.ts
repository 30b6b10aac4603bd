import { Redis } from 'ioredis';

import type { RedisConfig } from '../config.js';
import type { Logger } from '../logger.js';

/**
 * The Redis commands the session store relies on. ioredis satisfies it, and so does
 * the in-memory stand-in the test suites use.
 */
export interface SessionRedis {
    get(key: string): Promise<string | null>;
    setex(key: string, seconds: number, value: string): Promise<unknown>;
    expire(key: string, seconds: number): Promise<number>;
    exists(key: string): Promise<number>;
    del(key: string): Promise<number>;
    ttl(key: string): Promise<number>;
    keys(pattern: string): Promise<string[]>;
    ping(): Promise<string>;
    quit(): Promise<unknown>;
}

/**
 * Open the shared Redis connection
 *
 * Commands fail fast instead of queueing while Redis is down, so a request sees the
 * outage within the socket timeout.
 */
export function createRedisClient(config: RedisConfig, logger: Logger): Redis {
    const client = new Redis({
        host: config.host,
        port: config.port,
        db: config.db,
        ...(config.password ? { password: config.password } : {}),
        connectTimeout: config.connectTimeoutMs,
        commandTimeout: config.socketTimeoutMs,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        lazyConnect: true,
    });

    client.on('error', (error: Error) => {
        logger.warn('Redis connection error', { error: error.message });
    });
    client.on('ready', () => {
        logger.info('Redis connection ready', { host: config.host, port: config.port, db: config.db });
    });

    return client;
}
