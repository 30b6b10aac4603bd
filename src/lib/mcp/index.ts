/**
 * MCP Library
 *
 * Supervision of MCP server sub-processes and the helpers around them.
 */

export * from './types.js';
export * from './channel-lock.js';
export * from './process-control.js';
export * from './process-registry.js';
export * from './orphan-reaper.js';
export * from './schema-filter.js';
export * from './supervisor.js';
export * from './supervisor-factory.js';
export * from './tool-result.js';
