import { HttpErrors } from '../errors/http-error.js';
import { isJsonValue, isRecord, type JsonRecord, type JsonValue } from '../session/json-value.js';

/**
 * Concatenated text of every `text` content item in a call-tool result
 */
export function resultText(result: JsonRecord): string | null {
    const content = result.content;
    if (!Array.isArray(content)) {
        return null;
    }

    const texts: string[] = [];
    for (const item of content) {
        if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') {
            texts.push(item.text);
        }
    }
    return texts.length > 0 ? texts.join('') : null;
}

/**
 * Decode a call-tool result into the JSON value the tool produced
 *
 * Text that parses as JSON is returned parsed, whatever its type; text that does
 * not parse comes back as `{ result: <text> }`. A result flagged `isError` throws
 * ToolFailed.
 */
export function decodeToolResult(toolName: string, result: unknown): JsonValue {
    if (!isRecord(result)) {
        throw HttpErrors.toolFailed(`Tool ${toolName} returned a malformed result`);
    }

    const text = resultText(result);

    if (result.isError === true) {
        throw HttpErrors.toolFailed(errorText(text) ?? `Tool ${toolName} failed`, { tool: toolName });
    }

    if (text === null) {
        if (isRecord(result.structuredContent)) {
            return result.structuredContent;
        }
        if (isRecord(result.toolResult)) {
            return result.toolResult;
        }
        return { result: '' };
    }

    const parsed = parseJson(text);
    return parsed === undefined ? { result: text } : parsed;
}

function parseJson(text: string): JsonValue | undefined {
    try {
        const parsed: unknown = JSON.parse(text);
        return isJsonValue(parsed) ? parsed : undefined;
    } catch {
        return undefined;
    }
}

/**
 * Error results often carry a JSON body; prefer its message over the raw text
 */
function errorText(text: string | null): string | null {
    if (text === null) {
        return null;
    }
    const parsed = parseJson(text);
    if (isRecord(parsed)) {
        for (const key of ['error', 'message']) {
            const value = parsed[key];
            if (typeof value === 'string' && value.length > 0) {
                return value;
            }
        }
    }
    return text;
}
