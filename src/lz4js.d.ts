/**
 * Type declarations for lz4js
 * @see https://www.npmjs.com/package/lz4js
 */
declare module 'lz4js' {
    /** Compresses into one LZ4 frame. */
    export function compress(src: Uint8Array, maxSize?: number): Uint8Array;
    /** Decompresses an LZ4 frame; throws on a malformed frame. */
    export function decompress(src: Uint8Array, maxSize?: number): Uint8Array;
}
