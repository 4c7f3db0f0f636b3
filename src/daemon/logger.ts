import type { PltxLogger } from '../pltx/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some((l) => l === value);
}

/**
 * Console-backed logger hook for the daemon. Library code only ever sees
 * the `PltxLogger` shape.
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix: string = '[PLTX]'): PltxLogger {
    const threshold = LOG_LEVELS.indexOf(level);
    const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

    return {
        debug: enabled('debug') ? (msg) => console.debug(`${prefix} ${msg}`) : undefined,
        info: enabled('info') ? (msg) => console.log(`${prefix} ${msg}`) : undefined,
        warn: enabled('warn') ? (msg) => console.warn(`${prefix} ${msg}`) : undefined,
        error: enabled('error') ? (msg) => console.error(`${prefix} ${msg}`) : undefined,
    };
}
