/**
 * PLTX reader and signal streaming public API
 *
 * @module pltx
 */

import { PltxReader } from './pltx/reader.js';
import type { PltxReaderOptions, Sample, SampleRange, SignalMetadata } from './pltx/types.js';

export type {
    Sample, SampleRange, TimeRange, FileHeader, ChunkDescriptor, SignalMetadata, SignalEntry,
    PltxLogger as Logger, PltxReaderOptions as ReaderOptions
} from './pltx/types.js';
export { CompressionType, PLTX_VERSION, SUPPORTED_VERSIONS } from './pltx/format.js';
export {
    PltxError, OpenError, LookupError, DecodeError, ReadError, ConfigError
} from './pltx/errors.js';
export type { OpenErrorKind } from './pltx/errors.js';
export { LockTimeoutError, AsyncMutex } from './pltx/async-lock.js';
export { FileHandle } from './pltx/file-handle.js';
export { SignalIndex, parseSignalIndex } from './pltx/signal-index.js';
export { decodeChunk, decodeRecords } from './pltx/chunk-codec.js';
export { getOuterCodec } from './pltx/outer-codecs.js';
export type { OuterCodec } from './pltx/outer-codecs.js';
export { PltxReader } from './pltx/reader.js';
export { SignalCursor } from './pltx/cursor.js';
export type { CursorStep, CursorState, ChunkSource } from './pltx/cursor.js';
export { SignalCatalog } from './catalog/signal-catalog.js';
export type { CatalogEntry, RegisteredFile, ReaderSummary } from './catalog/signal-catalog.js';

export const PLTX = {
    /**
     * Opens a file and reads its signal table.
     */
    open: (path: string, options?: PltxReaderOptions): Promise<PltxReader> => PltxReader.open(path, options),

    /**
     * Lists the signals of a file without keeping it open.
     */
    inspect: async (path: string, options?: PltxReaderOptions): Promise<SignalMetadata[]> => {
        const reader = await PltxReader.open(path, options);
        try {
            return reader.listSignals();
        } finally {
            await reader.release();
        }
    },

    /**
     * Reads one whole signal (or the part inside `range`) and closes the file.
     */
    read: async (path: string, signal: string, range?: SampleRange, options?: PltxReaderOptions): Promise<Sample[]> => {
        const reader = await PltxReader.open(path, options);
        try {
            return await reader.readSignal(signal, range);
        } finally {
            await reader.release();
        }
    },
};

export default PLTX;

export {
    PltxDaemon, RPC_ERRORS, StreamingSession, loadPluginConfig, parsePluginConfig, createConsoleLogger
} from './daemon/index.js';
export type {
    PltxDaemonOptions, RpcRequest, RpcResponse, RpcErrorBody, RpcId,
    StreamChannel, StreamMessage, SessionOutcome, PluginConfig, ConnectionConfig, LogLevel
} from './daemon/index.js';
