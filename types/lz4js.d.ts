// lz4js ships plain JavaScript without declarations.
declare module "lz4js" {
  /** Decodes an LZ4 frame. Throws on a bad magic number or malformed blocks. */
  export function decompress(src: Uint8Array, maxSize?: number): Uint8Array;
  /** Encodes `src` as a single LZ4 frame. */
  export function compress(src: Uint8Array, maxSize?: number): Uint8Array;
}
