import { isRecord } from '../session/json-value.js';
import type { ToolDescriptor } from './types.js';

export const DEFAULT_SENSITIVE_PARAMS: readonly string[] = ['apiUrl', 'jwtToken'];

/**
 * Copy of `descriptor` with the sensitive input properties removed
 *
 * Names are dropped from `inputSchema.properties` and `inputSchema.required`;
 * nothing else changes and the original is left untouched.
 */
export function filterToolSchema(
    descriptor: ToolDescriptor,
    sensitiveNames: Iterable<string> = DEFAULT_SENSITIVE_PARAMS
): ToolDescriptor {
    const copy = structuredClone(descriptor);
    const schema = copy.inputSchema;
    if (!isRecord(schema)) {
        return copy;
    }

    const names = new Set(sensitiveNames);

    if (isRecord(schema.properties)) {
        for (const name of names) {
            delete schema.properties[name];
        }
    }
    if (Array.isArray(schema.required)) {
        schema.required = schema.required.filter(name => !names.has(name));
    }

    return copy;
}

export function filterToolSchemas(
    descriptors: readonly ToolDescriptor[],
    sensitiveNames: Iterable<string> = DEFAULT_SENSITIVE_PARAMS
): ToolDescriptor[] {
    const names = [...sensitiveNames];
    return descriptors.map(descriptor => filterToolSchema(descriptor, names));
}
