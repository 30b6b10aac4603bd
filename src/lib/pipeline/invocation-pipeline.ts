/**
 * Tool Invocation Pipeline
 *
 * One `/call-tool` request, end to end:
 *
 * 1. Read the session (resets its TTL); missing -> SessionMissing
 * 2. Start a supervisor bound to the session
 * 3. Effective params = caller params, then session credentials, then cached values
 *    for any other property the tool's input schema declares
 * 4. Cache the effective params (credentials excluded) before the call
 * 5. Call the tool
 * 6. On `status: "success"`, cache every output field; `intermediate` is unpacked
 * 7. Return the result without `intermediate`; a result that is not an object
 *    (array, string, number...) is returned as-is and nothing is cached
 * 8. Stop the supervisor, whatever happened
 *
 * Cache writes are best-effort: a value that is not JSON-serializable is skipped
 * with a warning and never fails the call.
 */

import { HttpErrors, errorMessage } from '../errors/http-error.js';
import type { Logger } from '../logger.js';
import { filterToolSchemas } from '../mcp/schema-filter.js';
import type { ToolDescriptor } from '../mcp/types.js';
import { isJsonSerializable, isRecord, type JsonRecord, type JsonValue } from '../session/json-value.js';
import type { SessionRecord, SessionStore } from '../session/session-store.js';

/** Session credentials; injected into calls, never overwritten by tool output */
export const CREDENTIAL_KEYS: readonly string[] = ['apiUrl', 'jwtToken'];

/** Bookkeeping fields the store maintains itself */
const RECORD_KEYS = new Set(['session_id', 'created_at', 'last_accessed']);

const INTERMEDIATE_KEY = 'intermediate';

/**
 * The part of a supervisor the pipeline drives
 */
export interface ToolSupervisor {
    getToolSchemas(): Promise<ToolDescriptor[]>;
    callTool(name: string, args: JsonRecord): Promise<JsonValue>;
    stop(): Promise<void>;
}

export interface SupervisorSource {
    forSession(sessionId: string): Promise<ToolSupervisor | null>;
    anonymous(): Promise<ToolSupervisor>;
}

export interface InvocationPipelineOptions {
    store: SessionStore;
    supervisors: SupervisorSource;
    sensitiveParams: readonly string[];
    /** `/tools-schema` cache lifetime; 0 disables the cache */
    schemaCacheTtlMs: number;
    logger: Logger;
    now?: () => number;
}

interface SchemaCacheEntry {
    key: string;
    expiresAt: number;
    tools: ToolDescriptor[];
}

export class InvocationPipeline {
    private readonly store: SessionStore;
    private readonly supervisors: SupervisorSource;
    private readonly sensitiveParams: readonly string[];
    private readonly schemaCacheTtlMs: number;
    private readonly logger: Logger;
    private readonly now: () => number;
    private readonly reserved: Set<string>;
    private schemaCache: SchemaCacheEntry | null = null;

    constructor(options: InvocationPipelineOptions) {
        this.store = options.store;
        this.supervisors = options.supervisors;
        this.sensitiveParams = [...options.sensitiveParams];
        this.schemaCacheTtlMs = options.schemaCacheTtlMs;
        this.logger = options.logger;
        this.now = options.now ?? Date.now;
        this.reserved = new Set([...CREDENTIAL_KEYS, ...RECORD_KEYS]);
    }

    async callTool(sessionId: string, tool: string, callerParams: JsonRecord = {}): Promise<JsonValue> {
        const session = await this.store.get(sessionId);
        if (!session) {
            throw HttpErrors.sessionMissing(sessionId);
        }

        const supervisor = await this.acquire(sessionId);
        try {
            const params = await this.buildParams(supervisor, tool, callerParams, session);
            this.logger.info(`Calling tool ${tool} for session ${sessionId}`, { params: Object.keys(params) });

            await this.cacheValues(sessionId, this.cacheableInputs(params), 'parameter');

            const result = await supervisor.callTool(tool, params);
            if (!isRecord(result)) {
                return result;
            }

            if (result.status === 'success') {
                await this.cacheValues(sessionId, this.cacheableOutputs(result), 'output');
            }

            return this.shapeResponse(result);
        } finally {
            await this.release(supervisor);
        }
    }

    /**
     * Filtered descriptors for a live session (`/tools`)
     */
    async listTools(sessionId: string): Promise<ToolDescriptor[]> {
        const supervisor = await this.acquire(sessionId);
        try {
            return filterToolSchemas(await supervisor.getToolSchemas(), this.sensitiveParams);
        } finally {
            await this.release(supervisor);
        }
    }

    /**
     * Filtered descriptors without a session (`/tools-schema`), cached briefly
     */
    async describeTools(): Promise<ToolDescriptor[]> {
        const key = [...this.sensitiveParams].sort().join(',');
        const cached = this.schemaCache;
        if (cached && cached.key === key && this.now() < cached.expiresAt) {
            return structuredClone(cached.tools);
        }

        const supervisor = await this.supervisors.anonymous();
        let tools: ToolDescriptor[];
        try {
            tools = filterToolSchemas(await supervisor.getToolSchemas(), this.sensitiveParams);
        } finally {
            await this.release(supervisor);
        }

        if (this.schemaCacheTtlMs > 0) {
            this.schemaCache = { key, expiresAt: this.now() + this.schemaCacheTtlMs, tools: structuredClone(tools) };
        }
        return tools;
    }

    private async acquire(sessionId: string): Promise<ToolSupervisor> {
        const supervisor = await this.supervisors.forSession(sessionId);
        if (!supervisor) {
            throw HttpErrors.sessionMissing(sessionId);
        }
        return supervisor;
    }

    private async release(supervisor: ToolSupervisor): Promise<void> {
        try {
            await supervisor.stop();
        } catch (error) {
            this.logger.warn('Error stopping MCP supervisor', { error: errorMessage(error) });
        }
    }

    private async buildParams(
        supervisor: ToolSupervisor,
        tool: string,
        callerParams: JsonRecord,
        session: SessionRecord
    ): Promise<JsonRecord> {
        const params: JsonRecord = { ...callerParams };
        const injected: string[] = [];

        for (const key of CREDENTIAL_KEYS) {
            if (!Object.hasOwn(params, key) && session[key] !== undefined) {
                params[key] = session[key];
                injected.push(key);
            }
        }

        try {
            const schemas = await supervisor.getToolSchemas();
            const descriptor = schemas.find(candidate => candidate.name === tool);
            const properties = descriptor?.inputSchema.properties;

            if (isRecord(properties)) {
                for (const name of Object.keys(properties)) {
                    if (
                        !CREDENTIAL_KEYS.includes(name) &&
                        !Object.hasOwn(params, name) &&
                        Object.hasOwn(session, name)
                    ) {
                        params[name] = session[name];
                        injected.push(name);
                    }
                }
            }
        } catch (error) {
            this.logger.warn(`Could not fetch tool schemas, skipping cache injection for ${tool}`, {
                error: errorMessage(error),
            });
        }

        if (injected.length > 0) {
            this.logger.debug(`Injected ${injected.join(', ')} into ${tool}`);
        }
        return params;
    }

    private cacheableInputs(params: JsonRecord): Array<[string, unknown]> {
        return Object.entries(params).filter(([key]) => !this.reserved.has(key));
    }

    private cacheableOutputs(result: JsonRecord): Array<[string, unknown]> {
        const entries: Array<[string, unknown]> = [];

        for (const [key, value] of Object.entries(result)) {
            if (key === 'status') {
                continue;
            }
            if (key === INTERMEDIATE_KEY && isRecord(value)) {
                entries.push(...Object.entries(value));
            } else {
                entries.push([key, value]);
            }
        }

        return entries.filter(([key]) => {
            if (this.reserved.has(key)) {
                this.logger.debug(`Not caching reserved key ${key} from tool output`);
                return false;
            }
            return true;
        });
    }

    private async cacheValues(sessionId: string, entries: Array<[string, unknown]>, kind: string): Promise<void> {
        const patch: JsonRecord = {};

        for (const [key, value] of entries) {
            if (isJsonSerializable(value)) {
                patch[key] = value;
            } else {
                this.logger.warn(`Skipping cache of ${kind} ${key}: value is not JSON-serializable`);
            }
        }

        if (Object.keys(patch).length === 0) {
            return;
        }

        if (!(await this.store.update(sessionId, patch))) {
            this.logger.warn(`Could not cache ${kind}s for session ${sessionId}`, { keys: Object.keys(patch) });
        }
    }

    private shapeResponse(result: JsonRecord): JsonRecord {
        const response: JsonRecord = {};

        for (const [key, value] of Object.entries(result)) {
            if (key === INTERMEDIATE_KEY) {
                continue;
            }
            if (!isJsonSerializable(value)) {
                this.logger.warn(`Dropping ${key} from response: value is not JSON-serializable`);
                continue;
            }
            response[key] = value;
        }

        return response;
    }
}
