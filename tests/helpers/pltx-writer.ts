import * as fs from 'fs/promises';
import * as path from 'path';
import { CompressionType, PLTX_VERSION, isCompressionType } from '../../src/pltx/format.js';
import { getOuterCodec } from '../../src/pltx/outer-codecs.js';
import type { Sample } from '../../src/pltx/types.js';

export interface SignalFixture {
    id: number;
    name: string;
    unit?: string;
    description?: string;
    source?: string;
    /** One inner array per chunk; chunks must not be empty. */
    chunks?: Sample[][];
}

export interface PltxFixture {
    version?: number;
    /** Raw header code; unknown codes are written as-is. */
    compression?: number;
    created?: number;
    signals: SignalFixture[];
}

export interface ChunkLayout {
    signalId: number;
    offset: number;
    byteLength: number;
    payloadOffset: number;
}

export interface PltxLayout {
    headerEnd: number;
    indexOffset: number;
    footerOffset: number;
    chunks: ChunkLayout[];
}

export const DEFAULT_CREATED = 1700000000;

const utf8 = new TextEncoder();

class ByteSink {
    private readonly parts: Uint8Array[] = [];
    length = 0;

    bytes(b: Uint8Array): void {
        this.parts.push(b);
        this.length += b.length;
    }

    ascii(s: string): void {
        this.bytes(utf8.encode(s));
    }

    u8(v: number): void { this.scalar(1, (dv) => dv.setUint8(0, v)); }
    u16(v: number): void { this.scalar(2, (dv) => dv.setUint16(0, v, true)); }
    u32(v: number): void { this.scalar(4, (dv) => dv.setUint32(0, v, true)); }
    u64(v: number): void { this.scalar(8, (dv) => dv.setBigUint64(0, BigInt(v), true)); }
    f64(v: number): void { this.scalar(8, (dv) => dv.setFloat64(0, v, true)); }

    str(s: string): void {
        const b = utf8.encode(s);
        this.u16(b.length);
        this.bytes(b);
    }

    toBytes(): Uint8Array {
        const out = new Uint8Array(this.length);
        let pos = 0;
        for (const p of this.parts) {
            out.set(p, pos);
            pos += p.length;
        }
        return out;
    }

    private scalar(size: number, set: (dv: DataView) => void): void {
        const b = new Uint8Array(size);
        set(new DataView(b.buffer));
        this.bytes(b);
    }
}

export function encodeSamples(samples: Sample[]): Uint8Array {
    const sink = new ByteSink();
    for (const s of samples) {
        sink.f64(s.timestamp);
        sink.f64(s.value);
    }
    return sink.toBytes();
}

async function storePayload(raw: Uint8Array, compression: number): Promise<Uint8Array> {
    if (!isCompressionType(compression) || compression === CompressionType.NONE) {
        return raw;
    }
    return getOuterCodec(compression).compress(raw);
}

/**
 * Serializes a recording: header, chunks in signal order, index, footer.
 */
export async function buildPltx(fixture: PltxFixture): Promise<{ bytes: Uint8Array; layout: PltxLayout }> {
    const compression = fixture.compression ?? CompressionType.NONE;
    const sink = new ByteSink();

    sink.ascii('PLTX');
    sink.u8(fixture.version ?? PLTX_VERSION);
    sink.u8(compression);
    sink.f64(fixture.created ?? DEFAULT_CREATED);
    sink.u16(fixture.signals.length);
    for (const s of fixture.signals) {
        sink.u32(s.id);
        sink.str(s.name);
        sink.str(s.unit ?? '');
        sink.str(s.description ?? '');
        sink.str(s.source ?? '');
    }
    const headerEnd = sink.length;

    const chunks: ChunkLayout[] = [];
    const index: { signalId: number; offset: number; minTs: number; maxTs: number }[] = [];
    for (const s of fixture.signals) {
        for (const samples of s.chunks ?? []) {
            const raw = encodeSamples(samples);
            const stored = await storePayload(raw, compression);
            const offset = sink.length;
            const minTs = samples[0].timestamp;
            const maxTs = samples[samples.length - 1].timestamp;

            sink.ascii('CHNK');
            sink.u32(s.id);
            sink.u32(samples.length);
            sink.u32(raw.length);
            sink.u32(stored.length);
            sink.f64(minTs);
            sink.f64(maxTs);
            sink.bytes(stored);

            chunks.push({ signalId: s.id, offset, byteLength: 36 + stored.length, payloadOffset: offset + 36 });
            index.push({ signalId: s.id, offset, minTs, maxTs });
        }
    }

    const indexOffset = sink.length;
    sink.ascii('IDXT');
    sink.u32(index.length);
    for (const e of index) {
        sink.u32(e.signalId);
        sink.u64(e.offset);
        sink.f64(e.minTs);
        sink.f64(e.maxTs);
    }

    const footerOffset = sink.length;
    sink.ascii('FTER');
    sink.u64(indexOffset);

    return { bytes: sink.toBytes(), layout: { headerEnd, indexOffset, footerOffset, chunks } };
}

export async function writePltx(
    dir: string,
    name: string,
    fixture: PltxFixture,
    mutate?: (bytes: Uint8Array, layout: PltxLayout) => void
): Promise<{ path: string; layout: PltxLayout; size: number }> {
    const { bytes, layout } = await buildPltx(fixture);
    mutate?.(bytes, layout);
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, bytes);
    return { path: filePath, layout, size: bytes.length };
}

export function setU32(bytes: Uint8Array, pos: number, v: number): void {
    new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint32(pos, v, true);
}

export function setU64(bytes: Uint8Array, pos: number, v: number): void {
    new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setBigUint64(pos, BigInt(v), true);
}

/** Voltage: 3 samples in 2 chunks. Current: no samples. */
export function sampleRecording(compression: number = CompressionType.NONE): PltxFixture {
    return {
        compression,
        signals: [
            {
                id: 1,
                name: 'Voltage',
                unit: 'V',
                description: 'Bus voltage',
                source: 'bench-a',
                chunks: [
                    [{ timestamp: 1, value: 10 }, { timestamp: 2, value: 11 }],
                    [{ timestamp: 3, value: 12 }],
                ],
            },
            { id: 2, name: 'Current', unit: 'A' },
        ],
    };
}
