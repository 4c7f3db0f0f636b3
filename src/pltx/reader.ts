import * as path from 'path';
import { FileHandle } from './file-handle.js';
import { parseSignalIndex, type SignalIndex } from './signal-index.js';
import { decodeChunk } from './chunk-codec.js';
import { SignalCursor, type ChunkSource } from './cursor.js';
import { LookupError, OpenError, PltxError, errorMessage } from './errors.js';
import type {
    ChunkDescriptor, FileHeader, PltxLogger, PltxReaderOptions, Sample, SampleRange, SignalMetadata
} from './types.js';

function hasErrorCode(err: unknown): err is { code: string } {
    return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/**
 * One opened PLTX file: its header, its signal index and the shared file
 * handle. Reference counted; the file closes when the last holder releases.
 */
export class PltxReader implements ChunkSource {
    private refs = 1;
    private closing: Promise<void> | null = null;

    private constructor(
        public readonly path: string,
        private readonly file: FileHandle,
        public readonly header: FileHeader,
        private readonly index: SignalIndex,
        private readonly logger: PltxLogger | null
    ) { }

    static async open(filePath: string, options: PltxReaderOptions = {}): Promise<PltxReader> {
        const logger = options.logger ?? null;
        let file: FileHandle;
        try {
            file = await FileHandle.open(filePath, options.lockTimeoutMs ?? 5000);
        } catch (e) {
            if (hasErrorCode(e) && e.code === 'ENOENT') {
                throw new OpenError('NotFound', `File not found: ${filePath}`, e);
            }
            throw new OpenError('IoError', `Cannot open ${filePath}: ${errorMessage(e)}`, e);
        }

        try {
            const { header, index } = await parseSignalIndex(file);
            logger?.debug?.(`Opened ${filePath}: v${header.version}, ${index.size} signals`);
            return new PltxReader(filePath, file, header, index, logger);
        } catch (e) {
            await file.close();
            throw e;
        }
    }

    /** File name without directories. */
    get displayName(): string {
        return path.basename(this.path);
    }

    get refCount(): number {
        return this.refs;
    }

    get closed(): boolean {
        return this.refs === 0;
    }

    listSignals(): SignalMetadata[] {
        return this.index.list();
    }

    getSignalMetadata(name: string): SignalMetadata | undefined {
        return this.index.get(name)?.metadata;
    }

    hasSignal(name: string): boolean {
        return this.index.has(name);
    }

    /**
     * Allocates a cursor; no I/O until its first pull. The cursor holds a
     * reference until it ends, fails or is closed.
     */
    openCursor(name: string, range?: SampleRange): SignalCursor {
        const entry = this.index.get(name);
        if (!entry) throw new LookupError(name);
        this.retain();
        return new SignalCursor(this, entry, range);
    }

    /**
     * Reads a whole signal (or the part inside `range`) into memory.
     */
    async readSignal(name: string, range?: SampleRange): Promise<Sample[]> {
        const cursor = this.openCursor(name, range);
        const samples: Sample[] = [];
        for (;;) {
            const step = await cursor.next();
            if (step.kind === 'end') return samples;
            if (step.kind === 'error') throw step.error;
            samples.push(step.sample);
        }
    }

    async loadChunk(descriptor: ChunkDescriptor): Promise<Sample[]> {
        const block = await this.file.readRange(descriptor.offset, descriptor.byteLength);
        return decodeChunk(block, descriptor, this.header.compression);
    }

    retain(): void {
        if (this.refs === 0) {
            throw new PltxError(`Reader for ${this.path} is closed`);
        }
        this.refs++;
    }

    /**
     * Drops one reference. The returned promise settles once the file is
     * closed when this was the last one.
     */
    async release(): Promise<void> {
        if (this.refs === 0) {
            await this.closing;
            return;
        }
        this.refs--;
        if (this.refs > 0) return;

        this.closing = this.file.close().catch((e: unknown) => {
            this.logger?.warn?.(`Failed to close ${this.path}: ${errorMessage(e)}`);
        });
        await this.closing;
        this.logger?.debug?.(`Closed ${this.path}`);
    }
}
