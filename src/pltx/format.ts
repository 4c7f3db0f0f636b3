export const PLTX_MAGIC = new Uint8Array([0x50, 0x4C, 0x54, 0x58]); // "PLTX"
export const CHUNK_MAGIC = new Uint8Array([0x43, 0x48, 0x4E, 0x4B]); // "CHNK"
export const INDEX_MAGIC = new Uint8Array([0x49, 0x44, 0x58, 0x54]); // "IDXT"
export const FOOTER_MAGIC = new Uint8Array([0x46, 0x54, 0x45, 0x52]); // "FTER"

export const PLTX_VERSION = 2;
export const SUPPORTED_VERSIONS: readonly number[] = [PLTX_VERSION];

export enum CompressionType {
    NONE = 0,
    ZLIB = 1,
    LZ4 = 2,
    ZSTD = 3,
}

export function isCompressionType(code: number): code is CompressionType {
    return code === CompressionType.NONE
        || code === CompressionType.ZLIB
        || code === CompressionType.LZ4
        || code === CompressionType.ZSTD;
}

// Record: timestamp(f64) value(f64)
export const RECORD_SIZE = 8 + 8;

// Header prefix: magic(4) version(u8) compression(u8) created(f64) signalCount(u16)
export const HEADER_PREFIX_SIZE = 4 + 1 + 1 + 8 + 2;

// Chunk header (after magic): signalId(u32) n(u32) rawLen(u32) storedLen(u32) minTs(f64) maxTs(f64)
export const CHUNK_HEADER_SIZE = 4 + 4 + 4 + 4 + 8 + 8;
export const CHUNK_PREAMBLE_SIZE = CHUNK_MAGIC.length + CHUNK_HEADER_SIZE;

// Index: magic(4) entryCount(u32), then entries of signalId(u32) offset(u64) minTs(f64) maxTs(f64)
export const INDEX_PREAMBLE_SIZE = 4 + 4;
export const INDEX_ENTRY_SIZE = 4 + 8 + 8 + 8;

// Footer: magic(4) indexOffset(u64)
export const FOOTER_SIZE = 4 + 8;

export function matchesMagic(data: Uint8Array, magic: Uint8Array, pos: number = 0): boolean {
    if (data.length < pos + magic.length) return false;
    for (let i = 0; i < magic.length; i++) {
        if (data[pos + i] !== magic[i]) return false;
    }
    return true;
}
