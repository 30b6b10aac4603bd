/**
 * Analytics MCP Server
 *
 * Exposes the analytics platform's REST API as MCP tools. Tool definitions live in
 * config/tools/*.json; this module supplies the handlers.
 *
 * Credentials travel as X-API-URL / X-JWT-TOKEN headers on reads and as
 * `apiSettings` in POST bodies. Bulky values the assistant should not see are
 * returned under `intermediate`, which the bridge caches and strips. Remote
 * failures come back as `{ status: 'error', error }` rather than MCP errors.
 */

import { readFileSync, readdirSync } from 'node:fs';

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import type { Logger } from '../lib/logger.js';
import type { ToolDescriptor } from '../lib/mcp/types.js';
import { isRecord, type JsonRecord } from '../lib/session/json-value.js';

// ============================================
// TOOL DEFINITIONS
// ============================================

const DEFAULT_TOOLS_DIR = new URL('../../config/tools/', import.meta.url);

export function loadToolDefinitions(dir: URL = DEFAULT_TOOLS_DIR): ToolDescriptor[] {
    const toolFiles = readdirSync(dir)
        .filter(file => file.endsWith('.json'))
        .sort();

    return toolFiles.map(file => {
        const tool: unknown = JSON.parse(readFileSync(new URL(file, dir), 'utf-8'));
        if (!isRecord(tool) || typeof tool.name !== 'string' || !isRecord(tool.inputSchema)) {
            throw new Error(`Invalid tool definition: ${file}`);
        }

        const { properties, required } = tool.inputSchema;
        return {
            name: tool.name,
            description: typeof tool.description === 'string' ? tool.description : '',
            inputSchema: {
                type: 'object',
                ...(isRecord(properties) ? { properties } : {}),
                ...(Array.isArray(required) ? { required: required.filter(isString) } : {}),
            },
        };
    });
}

function isString(value: unknown): value is string {
    return typeof value === 'string';
}

// ============================================
// CORE HELPER: Low-level HTTP requests
// ============================================

export interface AnalyticsApiOptions {
    baseUrl: string;
    defaultTimeoutMs: number;
    longTimeoutMs: number;
    fetch?: typeof fetch;
}

export class AnalyticsApi {
    private readonly baseUrl: string;
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: AnalyticsApiOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.fetchImpl = options.fetch ?? fetch;
    }

    get(path: string, headers: Record<string, string>, query: Record<string, string> = {}): Promise<unknown> {
        let url = `${this.baseUrl}${path}`;
        if (Object.keys(query).length > 0) {
            url += `?${new URLSearchParams(query).toString()}`;
        }
        return this.request('GET', url, headers, undefined, this.options.defaultTimeoutMs);
    }

    post(path: string, body: JsonRecord, long = false): Promise<unknown> {
        const timeoutMs = long ? this.options.longTimeoutMs : this.options.defaultTimeoutMs;
        return this.request('POST', `${this.baseUrl}${path}`, { 'Content-Type': 'application/json' }, body, timeoutMs);
    }

    private async request(
        method: 'GET' | 'POST',
        url: string,
        headers: Record<string, string>,
        body: JsonRecord | undefined,
        timeoutMs: number
    ): Promise<unknown> {
        const response = await this.fetchImpl(url, {
            method,
            headers: { Accept: 'application/json', ...headers },
            ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
            signal: AbortSignal.timeout(timeoutMs),
        });

        const text = await response.text();
        if (!response.ok) {
            throw new Error(`API Error (${response.status}): ${text || response.statusText}`);
        }

        try {
            return JSON.parse(text);
        } catch {
            throw new Error(`API returned invalid JSON from ${new URL(url).pathname}`);
        }
    }
}

// ============================================
// ARGUMENT HELPERS
// ============================================

function requireString(args: JsonRecord, name: string): string {
    const value = args[name];
    if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`Missing required argument: ${name}`);
    }
    return value;
}

function requirePresent(args: JsonRecord, name: string): unknown {
    if (args[name] === undefined || args[name] === null) {
        throw new Error(`Missing required argument: ${name}`);
    }
    return args[name];
}

function optionalNumber(args: JsonRecord, name: string, fallback: number): number {
    const value = args[name];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function credentialHeaders(args: JsonRecord): Record<string, string> {
    return {
        'X-API-URL': requireString(args, 'apiUrl'),
        'X-JWT-TOKEN': requireString(args, 'jwtToken'),
    };
}

function apiSettings(args: JsonRecord): JsonRecord {
    return { apiUrl: requireString(args, 'apiUrl'), jwtToken: requireString(args, 'jwtToken') };
}

function asRecord(value: unknown): JsonRecord {
    return isRecord(value) ? value : { result: value };
}

/**
 * Move `from` to `to` on a successful result
 */
function renameOnSuccess(result: JsonRecord, from: string, to: string): JsonRecord {
    if (result.status !== 'success' || !Object.hasOwn(result, from)) {
        return result;
    }
    const { [from]: value, ...rest } = result;
    return { ...rest, [to]: value };
}

// ============================================
// TOOL HANDLERS
// ============================================

type ToolHandler = (args: JsonRecord) => Promise<JsonRecord>;

export function createToolHandlers(api: AnalyticsApi): Record<string, ToolHandler> {
    return {
        validate_settings: async args => asRecord(await api.post('/settings/validate', apiSettings(args))),

        list_sources: async args => {
            const query = {
                search: typeof args.search === 'string' ? args.search : '',
                page: String(optionalNumber(args, 'page', 1)),
                limit: String(optionalNumber(args, 'limit', 10)),
            };
            const full = asRecord(await api.get('/sources', credentialHeaders(args), query));

            // A simpler shape for the assistant
            const data = Array.isArray(full.data)
                ? full.data.filter(isRecord).map(source => ({
                      id: source.id,
                      title: source.title,
                      type: source.type,
                      updated: source.updated,
                      numberOfColumns: Array.isArray(source.attributes) ? source.attributes.length : 0,
                  }))
                : [];

            return { count: typeof full.count === 'number' ? full.count : 0, data };
        },

        analyze_source_structure: async args => {
            const headers = credentialHeaders(args);
            const sourceId = requireString(args, 'sourceId');

            const sourceStructure = await api.get(`/source/${encodeURIComponent(sourceId)}/structure`, headers);
            const analysis = asRecord(await api.post('/analyze-columns', { sourceStructure }, true));

            if (analysis.status !== 'success' || !Object.hasOwn(analysis, 'columnAnalysis')) {
                return Object.keys(analysis).length > 0
                    ? analysis
                    : { status: 'error', error: 'Column analysis failed.' };
            }

            return {
                status: 'success',
                message: 'Successfully retrieved and analyzed the source structure.',
                columnAnalysis: analysis.columnAnalysis,
                intermediate: {
                    sourceStructure,
                    columnAnalysis: analysis.columnAnalysis,
                },
            };
        },

        generate_strategy: async args =>
            asRecord(
                await api.post(
                    '/generate-strategy',
                    {
                        question: requireString(args, 'question'),
                        columnAnalysis: requirePresent(args, 'columnAnalysis'),
                    },
                    true
                )
            ),

        create_configuration: async args => {
            const result = asRecord(
                await api.post(
                    '/create-configuration',
                    {
                        question: requireString(args, 'question'),
                        columnAnalysis: requirePresent(args, 'columnAnalysis'),
                        strategy: requirePresent(args, 'strategy'),
                    },
                    true
                )
            );
            return renameOnSuccess(result, 'configuration', 'markdownConfig');
        },

        generate_config: async args => {
            const payload: JsonRecord = {
                question: requireString(args, 'question'),
                sourceStructure: requirePresent(args, 'sourceStructure'),
            };
            if (typeof args.apiUrl === 'string' && args.apiUrl && typeof args.jwtToken === 'string' && args.jwtToken) {
                payload.apiSettings = { apiUrl: args.apiUrl, jwtToken: args.jwtToken };
            }
            return asRecord(await api.post('/generate-config', payload, true));
        },

        create_dashboard: async args => {
            const result = asRecord(
                await api.post(
                    '/create-dashboard',
                    {
                        markdownConfig: requireString(args, 'markdownConfig'),
                        sourceStructure: requirePresent(args, 'sourceStructure'),
                        apiSettings: apiSettings(args),
                    },
                    true
                )
            );
            return renameOnSuccess(result, 'charts', 'chartConfigs');
        },

        get_charts_data: async args => {
            const result = asRecord(
                await api.post(
                    '/charts/data',
                    { chartConfigs: requirePresent(args, 'chartConfigs'), apiSettings: apiSettings(args) },
                    true
                )
            );

            const chartData = result.chartData;
            if (result.status !== 'success' || !isRecord(chartData)) {
                return result;
            }

            const chartsWithData = Object.entries(chartData).map(([chartId, info]) => chartName(chartId, info));
            return {
                status: 'success',
                message: `Successfully fetched data for ${chartsWithData.length} charts.`,
                chartsWithData,
                intermediate: { chartData },
            };
        },

        analyze_charts: async args =>
            asRecord(
                await api.post(
                    '/analyze-charts',
                    {
                        chartData: requirePresent(args, 'chartData'),
                        question: requireString(args, 'question'),
                        apiSettings: apiSettings(args),
                    },
                    true
                )
            ),
    };
}

/**
 * Most descriptive label a chart configuration offers
 */
function chartName(chartId: string, info: unknown): string {
    const config = isRecord(info) && isRecord(info.configuration) ? info.configuration : {};
    for (const key of ['title', 'name', 'chart_type']) {
        const value = config[key];
        if (typeof value === 'string' && value.length > 0) {
            return value;
        }
    }
    return chartId;
}

// ============================================
// MCP SERVER
// ============================================

export interface AnalyticsServerOptions extends AnalyticsApiOptions {
    logger: Logger;
    tools?: ToolDescriptor[];
}

function textResult(value: JsonRecord, isError = false) {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify(value) }],
        ...(isError ? { isError: true } : {}),
    };
}

export function createAnalyticsToolServer(options: AnalyticsServerOptions): Server {
    const { logger } = options;
    const tools = options.tools ?? loadToolDefinitions();
    const handlers = createToolHandlers(new AnalyticsApi(options));

    const server = new Server({ name: 'analytics-tools', version: '1.0.0' }, { capabilities: { tools: {} } });

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

    server.setRequestHandler(CallToolRequestSchema, async request => {
        const { name, arguments: args } = request.params;

        const handler = handlers[name];
        if (!handler) {
            return textResult({ status: 'error', error: `Unknown tool: ${name}` }, true);
        }

        const startTime = process.hrtime.bigint();
        try {
            return textResult(await handler(args ?? {}));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`${name} error`, { error: message });
            return textResult({ status: 'error', error: message });
        } finally {
            logger.time(name, startTime);
        }
    });

    return server;
}
