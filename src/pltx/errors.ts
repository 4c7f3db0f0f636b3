export class PltxError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'PltxError';
    }
}

export type OpenErrorKind = 'NotFound' | 'BadHeader' | 'BadIndex' | 'IoError';

/**
 * The file could not be opened as a PLTX recording. Partial or corrupt
 * indexes are rejected as a whole.
 */
export class OpenError extends PltxError {
    constructor(public readonly kind: OpenErrorKind, message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'OpenError';
    }
}

export class LookupError extends PltxError {
    constructor(public readonly signalName: string) {
        super(`Unknown signal: ${signalName}`);
        this.name = 'LookupError';
    }
}

/** Corrupt or truncated chunk payload, failed decompression, sample-count mismatch. */
export class DecodeError extends PltxError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'DecodeError';
    }
}

export class ReadError extends PltxError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ReadError';
    }
}

export class ConfigError extends PltxError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ConfigError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
