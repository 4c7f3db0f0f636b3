import {
    CHUNK_MAGIC, CHUNK_PREAMBLE_SIZE, FOOTER_MAGIC, FOOTER_SIZE, HEADER_PREFIX_SIZE,
    INDEX_ENTRY_SIZE, INDEX_MAGIC, INDEX_PREAMBLE_SIZE, PLTX_MAGIC, RECORD_SIZE,
    SUPPORTED_VERSIONS, CompressionType, isCompressionType, matchesMagic
} from './format.js';
import { OpenError, PltxError, errorMessage } from './errors.js';
import type { FileHandle } from './file-handle.js';
import type { ChunkDescriptor, FileHeader, SignalEntry, SignalMetadata } from './types.js';

/**
 * Immutable signal table of one opened file, in header order.
 */
export class SignalIndex {
    private readonly byName = new Map<string, SignalEntry>();

    constructor(private readonly entries: readonly SignalEntry[]) {
        for (const entry of entries) {
            this.byName.set(entry.metadata.name, entry);
        }
    }

    get size(): number {
        return this.entries.length;
    }

    list(): SignalMetadata[] {
        return this.entries.map((e) => e.metadata);
    }

    get(name: string): SignalEntry | undefined {
        return this.byName.get(name);
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }
}

interface RawSignal {
    id: number;
    name: string;
    unit: string;
    description: string;
    source: string;
}

class TruncatedRegionError extends PltxError {
    constructor(pos: number, limit: number) {
        super(`Truncated region: need data at ${pos}, region ends at ${limit}`);
        this.name = 'TruncatedRegionError';
    }
}

/**
 * Buffered forward reader over [pos, limit) of a file, for the
 * variable-length signal table.
 */
class SequentialReader {
    private window: Uint8Array = new Uint8Array(0);
    private windowStart = 0;

    constructor(
        private readonly file: FileHandle,
        public pos: number,
        private readonly limit: number,
        private readonly blockSize: number = 64 * 1024
    ) { }

    async take(n: number): Promise<Uint8Array> {
        if (this.pos + n > this.limit) throw new TruncatedRegionError(this.pos + n, this.limit);
        const windowEnd = this.windowStart + this.window.length;
        if (this.pos < this.windowStart || this.pos + n > windowEnd) {
            const length = Math.min(Math.max(n, this.blockSize), this.limit - this.pos);
            this.window = await this.file.readRange(this.pos, length);
            this.windowStart = this.pos;
        }
        const start = this.pos - this.windowStart;
        this.pos += n;
        return this.window.subarray(start, start + n);
    }

    async u16(): Promise<number> {
        const b = await this.take(2);
        return b[0] | (b[1] << 8);
    }

    async u32(): Promise<number> {
        const b = await this.take(4);
        return new DataView(b.buffer, b.byteOffset, 4).getUint32(0, true);
    }

    async str(): Promise<string> {
        const len = await this.u16();
        return utf8.decode(await this.take(len));
    }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function readU64(view: DataView, pos: number): number {
    const big = view.getBigUint64(pos, true);
    if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new OpenError('BadIndex', `Offset ${big} exceeds the addressable range`);
    }
    return Number(big);
}

/**
 * Parses header, footer, index and every chunk header (never payloads).
 * Any inconsistency rejects the file.
 */
export async function parseSignalIndex(file: FileHandle): Promise<{ header: FileHeader; index: SignalIndex }> {
    try {
        return await parse(file);
    } catch (e) {
        if (e instanceof OpenError) throw e;
        throw new OpenError('IoError', `Failed to read ${file.path}: ${errorMessage(e)}`, e);
    }
}

async function parse(file: FileHandle): Promise<{ header: FileHeader; index: SignalIndex }> {
    if (file.size < HEADER_PREFIX_SIZE + FOOTER_SIZE) {
        throw new OpenError('BadHeader', `File too small to be PLTX (${file.size} bytes)`);
    }

    const prefix = await file.readRange(0, HEADER_PREFIX_SIZE);
    if (!matchesMagic(prefix, PLTX_MAGIC)) {
        throw new OpenError('BadHeader', 'Invalid magic bytes: not a PLTX file');
    }
    const pv = new DataView(prefix.buffer, prefix.byteOffset, prefix.byteLength);
    const version = pv.getUint8(4);
    if (!SUPPORTED_VERSIONS.includes(version)) {
        throw new OpenError('BadHeader', `Unsupported version: ${version}`);
    }
    const compressionCode = pv.getUint8(5);
    if (!isCompressionType(compressionCode)) {
        throw new OpenError('BadHeader', `Unsupported compression type: ${compressionCode}`);
    }
    const created = pv.getFloat64(6, true);
    const signalCount = pv.getUint16(14, true);

    const indexOffset = await readFooter(file);
    const indexEnd = file.size - FOOTER_SIZE;
    if (indexOffset < HEADER_PREFIX_SIZE || indexOffset + INDEX_PREAMBLE_SIZE > indexEnd) {
        throw new OpenError('BadIndex', `Index offset ${indexOffset} out of bounds`);
    }

    const { signals, headerEnd } = await readSignalTable(file, signalCount, indexOffset);

    const header: FileHeader = {
        version,
        compression: compressionCode,
        created,
        signalCount,
        indexOffset,
        indexLength: indexEnd - indexOffset,
    };

    const chunksById = await readIndex(file, header, signals, headerEnd);

    const entries: SignalEntry[] = signals.map((s) => {
        const chunks = chunksById.get(s.id) ?? [];
        return {
            metadata: Object.freeze({
                ...s,
                sampleCount: chunks.reduce((n, c) => n + c.sampleCount, 0),
                timeRange: chunks.length === 0 ? null : {
                    start: chunks[0].startTimestamp,
                    end: chunks.reduce((m, c) => Math.max(m, c.endTimestamp), -Infinity),
                },
            }),
            chunks: Object.freeze(chunks),
        };
    });

    return { header, index: new SignalIndex(entries) };
}

async function readFooter(file: FileHandle): Promise<number> {
    const footer = await file.readRange(file.size - FOOTER_SIZE, FOOTER_SIZE);
    if (!matchesMagic(footer, FOOTER_MAGIC)) {
        throw new OpenError('BadIndex', 'Footer missing: invalid footer magic');
    }
    return readU64(new DataView(footer.buffer, footer.byteOffset, footer.byteLength), 4);
}

async function readSignalTable(
    file: FileHandle,
    signalCount: number,
    limit: number
): Promise<{ signals: RawSignal[]; headerEnd: number }> {
    const reader = new SequentialReader(file, HEADER_PREFIX_SIZE, limit);
    const signals: RawSignal[] = [];
    const ids = new Set<number>();
    const names = new Set<string>();

    try {
        for (let i = 0; i < signalCount; i++) {
            const id = await reader.u32();
            const name = await reader.str();
            const unit = await reader.str();
            const description = await reader.str();
            const source = await reader.str();

            if (name.length === 0) throw new OpenError('BadHeader', `Signal ${id} has an empty name`);
            if (ids.has(id)) throw new OpenError('BadHeader', `Duplicate signal id ${id}`);
            if (names.has(name)) throw new OpenError('BadHeader', `Duplicate signal name "${name}"`);
            ids.add(id);
            names.add(name);
            signals.push({ id, name, unit, description, source });
        }
    } catch (e) {
        if (e instanceof OpenError) throw e;
        if (e instanceof TruncatedRegionError || e instanceof TypeError) {
            throw new OpenError('BadHeader', `Malformed signal table: ${e.message}`, e);
        }
        throw e;
    }

    return { signals, headerEnd: reader.pos };
}

async function readIndex(
    file: FileHandle,
    header: FileHeader,
    signals: RawSignal[],
    headerEnd: number
): Promise<Map<number, ChunkDescriptor[]>> {
    const region = await file.readRange(header.indexOffset, header.indexLength);
    if (!matchesMagic(region, INDEX_MAGIC)) {
        throw new OpenError('BadIndex', 'Index magic missing');
    }
    const view = new DataView(region.buffer, region.byteOffset, region.byteLength);
    const entryCount = view.getUint32(4, true);
    const expected = INDEX_PREAMBLE_SIZE + entryCount * INDEX_ENTRY_SIZE;
    if (expected !== region.length) {
        throw new OpenError('BadIndex', `Index declares ${entryCount} entries (${expected} bytes) but region is ${region.length} bytes`);
    }

    const known = new Set(signals.map((s) => s.id));
    const chunksById = new Map<number, ChunkDescriptor[]>();

    for (let i = 0; i < entryCount; i++) {
        const pos = INDEX_PREAMBLE_SIZE + i * INDEX_ENTRY_SIZE;
        const signalId = view.getUint32(pos, true);
        const offset = readU64(view, pos + 4);
        const startTimestamp = view.getFloat64(pos + 12, true);
        const endTimestamp = view.getFloat64(pos + 20, true);

        if (!known.has(signalId)) {
            throw new OpenError('BadIndex', `Index entry ${i} references undeclared signal ${signalId}`);
        }
        if (offset < headerEnd || offset + CHUNK_PREAMBLE_SIZE > header.indexOffset) {
            throw new OpenError('BadIndex', `Index entry ${i}: chunk offset ${offset} out of bounds`);
        }

        const descriptor = await readChunkDescriptor(file, header, signalId, offset, startTimestamp, endTimestamp);

        let list = chunksById.get(signalId);
        if (!list) {
            list = [];
            chunksById.set(signalId, list);
        }
        const prev = list[list.length - 1];
        if (prev && !(prev.startTimestamp < startTimestamp)) {
            throw new OpenError('BadIndex', `Signal ${signalId}: chunk start timestamps not strictly increasing at ${offset}`);
        }
        list.push(descriptor);
    }

    return chunksById;
}

async function readChunkDescriptor(
    file: FileHandle,
    header: FileHeader,
    signalId: number,
    offset: number,
    startTimestamp: number,
    endTimestamp: number
): Promise<ChunkDescriptor> {
    const pre = await file.readRange(offset, CHUNK_PREAMBLE_SIZE);
    if (!matchesMagic(pre, CHUNK_MAGIC)) {
        throw new OpenError('BadIndex', `No chunk at offset ${offset}`);
    }
    const view = new DataView(pre.buffer, pre.byteOffset, pre.byteLength);
    const chunkSignal = view.getUint32(4, true);
    const sampleCount = view.getUint32(8, true);
    const rawLength = view.getUint32(12, true);
    const payloadLength = view.getUint32(16, true);

    if (chunkSignal !== signalId) {
        throw new OpenError('BadIndex', `Index points to wrong signal at ${offset} (${chunkSignal} != ${signalId})`);
    }
    if (rawLength !== sampleCount * RECORD_SIZE) {
        throw new OpenError('BadIndex', `Chunk at ${offset}: raw length ${rawLength} does not hold ${sampleCount} records`);
    }
    const byteLength = CHUNK_PREAMBLE_SIZE + payloadLength;
    if (offset + byteLength > header.indexOffset) {
        throw new OpenError('BadIndex', `Chunk at ${offset} overruns the index region`);
    }

    return {
        offset,
        byteLength,
        payloadLength,
        rawLength,
        sampleCount,
        startTimestamp,
        endTimestamp,
        compressed: header.compression !== CompressionType.NONE,
    };
}
