import {
    CHUNK_MAGIC, CHUNK_PREAMBLE_SIZE, CompressionType, RECORD_SIZE, matchesMagic
} from './format.js';
import { DecodeError, errorMessage } from './errors.js';
import { getOuterCodec } from './outer-codecs.js';
import type { ChunkDescriptor, Sample } from './types.js';

/**
 * Decodes one chunk block, as read from disk starting at its magic, into
 * samples. Stateless; the only async step is decompression.
 */
export async function decodeChunk(
    block: Uint8Array,
    descriptor: ChunkDescriptor,
    compression: CompressionType
): Promise<Sample[]> {
    if (block.length !== descriptor.byteLength) {
        throw new DecodeError(`Chunk at ${descriptor.offset}: expected ${descriptor.byteLength} bytes, got ${block.length}`);
    }
    if (!matchesMagic(block, CHUNK_MAGIC)) {
        throw new DecodeError(`Chunk at ${descriptor.offset}: invalid chunk magic`);
    }

    const view = new DataView(block.buffer, block.byteOffset, block.byteLength);
    const sampleCount = view.getUint32(8, true);
    if (sampleCount !== descriptor.sampleCount) {
        throw new DecodeError(`Chunk at ${descriptor.offset}: header declares ${sampleCount} samples, index expects ${descriptor.sampleCount}`);
    }

    const stored = block.subarray(CHUNK_PREAMBLE_SIZE);
    const raw = await inflatePayload(stored, descriptor, compression);

    if (raw.length !== descriptor.rawLength) {
        throw new DecodeError(`Chunk at ${descriptor.offset}: expected ${descriptor.rawLength} decoded bytes, got ${raw.length}`);
    }
    return decodeRecords(raw, descriptor.sampleCount);
}

async function inflatePayload(
    stored: Uint8Array,
    descriptor: ChunkDescriptor,
    compression: CompressionType
): Promise<Uint8Array> {
    if (!descriptor.compressed) return stored;
    try {
        return await getOuterCodec(compression).decompress(stored, descriptor.rawLength);
    } catch (e) {
        throw new DecodeError(`Chunk at ${descriptor.offset}: decompression failed (${errorMessage(e)})`, e);
    }
}

/**
 * Reads `count` little-endian (timestamp, value) float64 pairs.
 */
export function decodeRecords(raw: Uint8Array, count: number): Sample[] {
    if (raw.length !== count * RECORD_SIZE) {
        throw new DecodeError(`Record payload is ${raw.length} bytes, ${count} samples need ${count * RECORD_SIZE}`);
    }
    const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
    const samples: Sample[] = [];
    for (let pos = 0; pos < raw.length; pos += RECORD_SIZE) {
        samples.push({
            timestamp: view.getFloat64(pos, true),
            value: view.getFloat64(pos + 8, true),
        });
    }
    return samples;
}
