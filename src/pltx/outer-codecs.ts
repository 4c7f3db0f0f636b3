import { promisify } from 'node:util';
import { deflate, inflate } from 'node:zlib';
import * as lz4 from 'lz4js';
import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { CompressionType } from './format.js';

const inflateAsync = promisify(inflate);
const deflateAsync = promisify(deflate);

export interface OuterCodec {
    id: CompressionType;
    name: string;
    compress(data: Uint8Array, level?: number): Promise<Uint8Array>;
    decompress(data: Uint8Array, maxSize?: number): Promise<Uint8Array>;
}

/**
 * Registry of available outer codecs.
 */
export const OUTER_CODECS: Map<CompressionType, OuterCodec> = new Map();

function checkLimit(size: number, maxSize?: number): void {
    if (maxSize !== undefined && size > maxSize) {
        throw new Error(`Decompressed size limit exceeded (${size} > ${maxSize})`);
    }
}

/**
 * Identity codec (no compression).
 */
export const OuterCodecNone: OuterCodec = {
    id: CompressionType.NONE,
    name: 'NONE',
    async compress(data: Uint8Array) {
        return data;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        checkLimit(data.length, maxSize);
        return data;
    },
};

export const OuterCodecZlib: OuterCodec = {
    id: CompressionType.ZLIB,
    name: 'ZLIB',
    async compress(data: Uint8Array, level: number = 6) {
        return new Uint8Array(await deflateAsync(data, { level }));
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        const out = await inflateAsync(data, maxSize !== undefined ? { maxOutputLength: Math.max(1, maxSize) } : {});
        checkLimit(out.length, maxSize);
        return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
    },
};

let zstdInstance: ZstdModule | null = null;

async function getZstd(): Promise<ZstdModule> {
    if (zstdInstance) return zstdInstance;
    return new Promise((resolve) => {
        ZstdCodec.run((zstd) => {
            zstdInstance = zstd;
            resolve(zstd);
        });
    });
}

export const OuterCodecZstd: OuterCodec = {
    id: CompressionType.ZSTD,
    name: 'ZSTD',
    async compress(data: Uint8Array, level: number = 3) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const compressed = simple.compress(data, level);
        if (!compressed) throw new Error('Zstd compression failed');
        return compressed;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const decompressed = simple.decompress(data);
        if (!decompressed) {
            // An empty frame decodes to null.
            if (maxSize === 0) return new Uint8Array(0);
            throw new Error('Zstd decompression failed');
        }
        checkLimit(decompressed.length, maxSize);
        return decompressed;
    },
};

/**
 * LZ4 frame format codec.
 */
export const OuterCodecLz4: OuterCodec = {
    id: CompressionType.LZ4,
    name: 'LZ4',
    async compress(data: Uint8Array) {
        return lz4.compress(data);
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        const out = lz4.decompress(data);
        checkLimit(out.length, maxSize);
        return out;
    },
};

OUTER_CODECS.set(CompressionType.NONE, OuterCodecNone);
OUTER_CODECS.set(CompressionType.ZLIB, OuterCodecZlib);
OUTER_CODECS.set(CompressionType.LZ4, OuterCodecLz4);
OUTER_CODECS.set(CompressionType.ZSTD, OuterCodecZstd);

export function getOuterCodec(id: CompressionType): OuterCodec {
    const codec = OUTER_CODECS.get(id);
    if (!codec) {
        throw new Error(`No codec available for compression type ${CompressionType[id] ?? id}`);
    }
    return codec;
}
