/**
 * Session Store
 *
 * Redis-backed session records with a sliding idle TTL. One key per session
 * (`<prefix>:<session_id>`) holding a JSON object:
 *
 *   { session_id, created_at, last_accessed, apiUrl, jwtToken, ...cached values }
 *
 * Any successful get, update or touch resets the TTL to the full idle timeout;
 * exists and ttl never do. Each operation is a single round-trip or a GET + SETEX
 * pair, so concurrent writers on one session race and the last writer wins.
 */

import type { Logger } from '../logger.js';
import type { SessionRedis } from './redis-client.js';
import { isRecord, type JsonRecord } from './json-value.js';

export type SessionRecord = JsonRecord;

export interface SessionStoreOptions {
    idleTtlSeconds: number;
    keyPrefix: string;
    logger: Logger;
    /** Tracked-process count reported by stats() */
    trackedProcesses?: () => number;
    now?: () => Date;
}

export interface SessionStats {
    redis_sessions: number;
    tracked_processes: number;
    architecture: 'redis_with_process_tracking';
}

export class SessionStore {
    private readonly idleTtl: number;
    private readonly prefix: string;
    private readonly logger: Logger;
    private readonly trackedProcesses: () => number;
    private readonly now: () => Date;

    constructor(
        private readonly redis: SessionRedis,
        options: SessionStoreOptions
    ) {
        this.idleTtl = options.idleTtlSeconds;
        this.prefix = options.keyPrefix;
        this.logger = options.logger;
        this.trackedProcesses = options.trackedProcesses ?? (() => 0);
        this.now = options.now ?? (() => new Date());
    }

    get idleTtlSeconds(): number {
        return this.idleTtl;
    }

    /**
     * Create (or overwrite) a session record with a fresh TTL
     */
    async create(sessionId: string, data: SessionRecord): Promise<boolean> {
        const stamp = this.now().toISOString();
        const record: SessionRecord = {
            ...data,
            created_at: stamp,
            last_accessed: stamp,
            session_id: sessionId,
        };

        try {
            await this.redis.setex(this.key(sessionId), this.idleTtl, JSON.stringify(record));
            this.logger.info(`Created session ${sessionId} with idle TTL ${this.idleTtl}s`);
            return true;
        } catch (error) {
            this.logger.error(`Error creating session ${sessionId}`, error);
            return false;
        }
    }

    /**
     * Read a session record and reset its idle TTL
     *
     * A record that does not decode to a JSON object is deleted.
     */
    async get(sessionId: string): Promise<SessionRecord | null> {
        const key = this.key(sessionId);

        try {
            const raw = await this.redis.get(key);
            if (raw === null) {
                this.logger.debug(`Session ${sessionId} not found or expired`);
                return null;
            }

            const record = decodeRecord(raw);
            if (!record) {
                this.logger.warn(`Invalid JSON data for session ${sessionId}, deleting it`);
                await this.deleteKey(sessionId);
                return null;
            }

            record.last_accessed = this.now().toISOString();
            await this.redis.setex(key, this.idleTtl, JSON.stringify(record));
            this.logger.debug(`Accessed session ${sessionId}, TTL reset to ${this.idleTtl}s`);
            return record;
        } catch (error) {
            this.logger.error(`Error getting session ${sessionId}`, error);
            return null;
        }
    }

    /**
     * Shallow-merge `patch` into an existing record and reset its TTL
     */
    async update(sessionId: string, patch: SessionRecord): Promise<boolean> {
        const current = await this.get(sessionId);
        if (!current) {
            this.logger.warn(`Cannot update non-existent session ${sessionId}`);
            return false;
        }

        const record: SessionRecord = {
            ...current,
            ...patch,
            last_accessed: this.now().toISOString(),
        };

        try {
            await this.redis.setex(this.key(sessionId), this.idleTtl, JSON.stringify(record));
            this.logger.debug(`Updated session ${sessionId}`, { keys: Object.keys(patch) });
            return true;
        } catch (error) {
            this.logger.error(`Error updating session ${sessionId}`, error);
            return false;
        }
    }

    /**
     * Reset the idle TTL without rewriting the value
     */
    async touch(sessionId: string): Promise<boolean> {
        try {
            const result = await this.redis.expire(this.key(sessionId), this.idleTtl);
            if (result !== 1) {
                this.logger.debug(`Cannot touch missing session ${sessionId}`);
                return false;
            }
            return true;
        } catch (error) {
            this.logger.error(`Error touching session ${sessionId}`, error);
            return false;
        }
    }

    async delete(sessionId: string): Promise<boolean> {
        try {
            const removed = await this.deleteKey(sessionId);
            if (removed) {
                this.logger.info(`Deleted session ${sessionId}`);
            }
            return removed;
        } catch (error) {
            this.logger.error(`Error deleting session ${sessionId}`, error);
            return false;
        }
    }

    /**
     * Existence check; leaves the TTL untouched
     */
    async exists(sessionId: string): Promise<boolean> {
        try {
            return (await this.redis.exists(this.key(sessionId))) === 1;
        } catch (error) {
            this.logger.error(`Error checking session ${sessionId}`, error);
            return false;
        }
    }

    /**
     * Remaining TTL in seconds (-2 when missing, -1 without expiry)
     */
    async ttl(sessionId: string): Promise<number> {
        try {
            return await this.redis.ttl(this.key(sessionId));
        } catch (error) {
            this.logger.error(`Error reading TTL of session ${sessionId}`, error);
            return -2;
        }
    }

    /**
     * Ids of every live session under the prefix. Throws when Redis is unreachable.
     */
    async listSessionIds(): Promise<string[]> {
        const keys = await this.redis.keys(`${this.prefix}:*`);
        const head = `${this.prefix}:`;
        return keys.filter(key => key.startsWith(head)).map(key => key.slice(head.length));
    }

    async stats(): Promise<SessionStats> {
        let sessions = 0;
        try {
            sessions = (await this.listSessionIds()).length;
        } catch (error) {
            this.logger.error('Error counting sessions', error);
        }

        return {
            redis_sessions: sessions,
            tracked_processes: this.trackedProcesses(),
            architecture: 'redis_with_process_tracking',
        };
    }

    async ping(): Promise<void> {
        await this.redis.ping();
    }

    async close(): Promise<void> {
        try {
            await this.redis.quit();
            this.logger.info('Redis connection closed');
        } catch (error) {
            this.logger.warn('Error closing Redis connection', error);
        }
    }

    private key(sessionId: string): string {
        return `${this.prefix}:${sessionId}`;
    }

    private async deleteKey(sessionId: string): Promise<boolean> {
        return (await this.redis.del(this.key(sessionId))) > 0;
    }
}

function decodeRecord(raw: string): SessionRecord | null {
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : null;
    } catch {
        return null;
    }
}
