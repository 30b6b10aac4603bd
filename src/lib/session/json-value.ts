export type JsonRecord = Record<string, unknown>;

/** Any value JSON.parse can produce */
export type JsonValue = JsonRecord | unknown[] | string | number | boolean | null;

export function isRecord(value: unknown): value is JsonRecord {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
            return true;
        case 'object':
            return value === null || Array.isArray(value) || isRecord(value);
        default:
            return false;
    }
}

/**
 * True when the value survives JSON encoding as-is.
 *
 * Functions, symbols, bigints, cycles and non-finite numbers are rejected, so are
 * values nested inside objects and arrays that JSON.stringify would silently drop
 * or rewrite.
 */
export function isJsonSerializable(value: unknown): boolean {
    return check(value, new Set());
}

function check(value: unknown, seen: Set<object>): boolean {
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'object':
            break;
        default:
            return false;
    }

    if (value === null) {
        return true;
    }
    if (seen.has(value)) {
        return false;
    }

    seen.add(value);
    try {
        if (Array.isArray(value)) {
            return value.every(item => check(item, seen));
        }
        if (!isPlainObject(value)) {
            return false;
        }
        return Object.values(value).every(item => check(item, seen));
    } finally {
        seen.delete(value);
    }
}

function isPlainObject(value: object): boolean {
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
