/**
 * Environment Variable Loader
 *
 * Loads KEY=VALUE pairs from .env files into process.env.
 *
 * - Comments (#), empty lines and an optional leading `export ` are skipped
 * - Single and double quoted values; inline comments after unquoted values
 * - Existing variables win unless `override` is set
 * - Several files are applied in order, so `.env.<NODE_ENV>` can refine `.env`
 */

import { readFileSync, existsSync } from 'node:fs';

export interface LoadEnvOptions {
    /** Files to read, in order (default: ['.env']) */
    paths?: string[];
    /** Print what was set (default: false) */
    debug?: boolean;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target object (default: process.env) */
    target?: NodeJS.ProcessEnv;
}

export interface LoadEnvResult {
    loaded: string[];
    skipped: string[];
    missingFiles: string[];
}

const SECRET_KEY_PATTERN = /secret|password|token|key/i;

/**
 * Parse .env file content into ordered entries
 */
export function parseEnv(content: string): Array<[string, string]> {
    const entries: Array<[string, string]> = [];

    for (const line of content.split(/\r?\n/)) {
        let trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#')) {
            continue;
        }
        if (trimmed.startsWith('export ')) {
            trimmed = trimmed.slice('export '.length).trim();
        }

        const eqIndex = trimmed.indexOf('=');
        if (eqIndex <= 0) {
            continue;
        }

        const key = trimmed.slice(0, eqIndex).trim();
        let value = trimmed.slice(eqIndex + 1).trim();

        const quote = value[0];
        if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
            value = value.slice(1, -1);
        } else {
            const hashIndex = value.indexOf(' #');
            if (hashIndex !== -1) {
                value = value.slice(0, hashIndex).trim();
            }
        }

        entries.push([key, value]);
    }

    return entries;
}

export function maskEnvValue(key: string, value: string): string {
    return SECRET_KEY_PATTERN.test(key) ? '***' : value;
}

/**
 * Load environment variables from one or more .env files
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
    const { paths = ['.env'], debug = false, override = false, target = process.env } = options;
    const result: LoadEnvResult = { loaded: [], skipped: [], missingFiles: [] };
    // Keys set by an earlier file may be refined by a later one
    const ownKeys = new Set<string>();

    for (const path of paths) {
        if (!existsSync(path)) {
            result.missingFiles.push(path);
            if (debug) {
                console.debug(`[env] File not found: ${path}`);
            }
            continue;
        }

        for (const [key, value] of parseEnv(readFileSync(path, 'utf-8'))) {
            if (target[key] !== undefined && !override && !ownKeys.has(key)) {
                result.skipped.push(key);
                continue;
            }

            target[key] = value;
            ownKeys.add(key);
            result.loaded.push(key);

            if (debug) {
                console.debug(`[env] Set ${key}=${maskEnvValue(key, value)}`);
            }
        }
    }

    if (debug) {
        console.debug(`[env] Loaded ${result.loaded.length} variables (${result.skipped.length} skipped)`);
    }

    return result;
}
