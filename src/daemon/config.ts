import * as fs from 'fs/promises';
import { ConfigError, errorMessage } from '../pltx/errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface ConnectionConfig {
    ip: string;
    /** 0 binds an ephemeral port; the bound port is written back on start. */
    port: number;
}

export interface PluginConfig {
    name: string;
    id: string;
    version: string;
    description: string;
    connection: ConnectionConfig;
    file_formats: string[];
    /** Max wait for a file's read lock (ms). */
    lockTimeoutMs: number;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG_PATH = 'plugin.json';

const DEFAULTS = {
    description: '',
    file_formats: ['pltx'],
    lockTimeoutMs: 5000,
    logLevel: 'info',
} satisfies Partial<PluginConfig>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
    const v = obj[key];
    if (typeof v !== 'string' || v.length === 0) {
        throw new ConfigError(`${where}.${key} must be a non-empty string`);
    }
    return v;
}

function optionalString(obj: Record<string, unknown>, key: string, fallback: string): string {
    const v = obj[key];
    if (v === undefined) return fallback;
    if (typeof v !== 'string') throw new ConfigError(`config.${key} must be a string`);
    return v;
}

/**
 * Validates a decoded plugin config and fills in defaults.
 */
export function parsePluginConfig(raw: unknown): PluginConfig {
    if (!isRecord(raw)) throw new ConfigError('config must be a JSON object');

    const conn = raw.connection;
    if (!isRecord(conn)) throw new ConfigError('config.connection must be an object');
    const port = conn.port;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError('config.connection.port must be an integer in [0, 65535]');
    }

    const formats = raw.file_formats ?? DEFAULTS.file_formats;
    if (!Array.isArray(formats) || !formats.every((f): f is string => typeof f === 'string')) {
        throw new ConfigError('config.file_formats must be an array of strings');
    }

    const lockTimeoutMs = raw.lockTimeoutMs ?? DEFAULTS.lockTimeoutMs;
    if (typeof lockTimeoutMs !== 'number' || !(lockTimeoutMs > 0)) {
        throw new ConfigError('config.lockTimeoutMs must be a positive number');
    }

    const logLevel = raw.logLevel ?? DEFAULTS.logLevel;
    if (!isLogLevel(logLevel)) {
        throw new ConfigError(`config.logLevel must be one of debug, info, warn, error, silent`);
    }

    return {
        name: requireString(raw, 'name', 'config'),
        id: requireString(raw, 'id', 'config'),
        version: requireString(raw, 'version', 'config'),
        description: optionalString(raw, 'description', DEFAULTS.description),
        connection: { ip: requireString(conn, 'ip', 'config.connection'), port },
        file_formats: [...formats],
        lockTimeoutMs,
        logLevel,
    };
}

export async function loadPluginConfig(filePath: string = DEFAULT_CONFIG_PATH): Promise<PluginConfig> {
    let data: string;
    try {
        data = await fs.readFile(filePath, 'utf8');
    } catch (e) {
        throw new ConfigError(`File read error: ${errorMessage(e)} ${filePath}`, e);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (e) {
        throw new ConfigError(`JSON parse error in ${filePath}: ${errorMessage(e)}`, e);
    }
    return parsePluginConfig(raw);
}
