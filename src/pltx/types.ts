import type { CompressionType } from './format.js';

export type PltxLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export interface Sample {
    timestamp: number;
    value: number;
}

export interface TimeRange {
    start: number;
    end: number;
}

export interface FileHeader {
    version: number;
    compression: CompressionType;
    /** Recording creation time, epoch seconds. */
    created: number;
    signalCount: number;
    /** Byte offset of the index region (its magic). */
    indexOffset: number;
    /** Index region length, excluding the footer. */
    indexLength: number;
}

export interface ChunkDescriptor {
    /** Offset of the chunk magic. */
    offset: number;
    /** Magic + chunk header + stored payload. */
    byteLength: number;
    payloadLength: number;
    rawLength: number;
    sampleCount: number;
    startTimestamp: number;
    endTimestamp: number;
    compressed: boolean;
}

export interface SignalMetadata {
    id: number;
    name: string;
    unit: string;
    description: string;
    source: string;
    sampleCount: number;
    /** null for a signal without chunks. */
    timeRange: TimeRange | null;
}

export interface SignalEntry {
    metadata: SignalMetadata;
    chunks: readonly ChunkDescriptor[];
}

/** Optional bounds for a cursor; both ends inclusive. */
export type SampleRange = {
    start?: number;
    end?: number;
};

export type PltxReaderOptions = {
    /** Max wait for the file lock per physical read (ms). Default 5000. */
    lockTimeoutMs?: number;
    logger?: PltxLogger | null;
};
