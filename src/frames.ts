// Frame checks for the buffered engines.
//
// fzstd and lz4js decode whatever they are handed: lz4js ignores the header
// checksum, block bounds, the EndMark and the content checksum, and fzstd
// never looks at the content checksum. Each frame is walked here first, then
// decoded on its own, and the output is held against the declared size and
// checksum. Any mismatch throws; adapters report it as CorruptData.
//
//   lz4   magic 04 22 4D 18 │ FLG BD [size] [dict] HC │ blocks… │ EndMark │ [xxh32]
//   zstd  magic 28 B5 2F FD │ FHD [window] [dict] [size] │ blocks… │ [xxh64 low 32]

import { KompressError } from "./errors.js";
import { concatChunks } from "./streams.js";

/** The xxHash entry points the checks need (xxhash-wasm's raw API). */
export interface FrameHashes {
  h32Raw(input: Uint8Array, seed?: number): number;
  h64Raw(input: Uint8Array, seed?: bigint): bigint;
}

/** A whole-frame decoder; `size` is the decoded length when it is known. */
export type FrameDecompress = (frame: Uint8Array, size: number) => Uint8Array;

const LZ4_MAGIC = 0x184d2204;
const ZSTD_MAGIC = 0xfd2fb528;
const ZSTD_MAX_BLOCK = 128 * 1024;

const LZ4_BLOCK_MAX: Record<number, number | undefined> = {
  4: 64 * 1024,
  5: 256 * 1024,
  6: 1024 * 1024,
  7: 4 * 1024 * 1024,
};

function isSkippable(magic: number): boolean {
  return magic >>> 4 === 0x184d2a5;
}

function hex(n: number): string {
  return `0x${n.toString(16).padStart(8, "0")}`;
}

// ── Reader ────────────────────────────────────────────────────────────────────

class FrameReader {
  readonly #src: Uint8Array;
  readonly #view: DataView;
  pos = 0;

  constructor(src: Uint8Array) {
    this.#src = src;
    this.#view = new DataView(src.buffer, src.byteOffset, src.byteLength);
  }

  get remaining(): number {
    return this.#src.byteLength - this.pos;
  }

  #need(n: number, what: string): number {
    if (n > this.remaining) {
      throw new Error(`truncated ${what} at offset ${this.pos}: need ${n} bytes, have ${this.remaining}`);
    }
    const at = this.pos;
    this.pos += n;
    return at;
  }

  u8(what: string): number {
    return this.#view.getUint8(this.#need(1, what));
  }

  u16(what: string): number {
    return this.#view.getUint16(this.#need(2, what), true);
  }

  u24(what: string): number {
    const at = this.#need(3, what);
    return this.#view.getUint16(at, true) | (this.#view.getUint8(at + 2) << 16);
  }

  u32(what: string): number {
    return this.#view.getUint32(this.#need(4, what), true);
  }

  u64(what: string): number {
    const v = this.#view.getBigUint64(this.#need(8, what), true);
    if (v > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error(`${what} too large: ${v}`);
    return Number(v);
  }

  bytes(n: number, what: string): Uint8Array {
    const at = this.#need(n, what);
    return this.#src.subarray(at, at + n);
  }

  from(start: number): Uint8Array {
    return this.#src.subarray(start, this.pos);
  }
}

interface Frame {
  /** The frame's bytes, magic included. */
  bytes: Uint8Array;
  /** Decoded length, when the frame declares or implies it. */
  size?: number;
  checksum?: number;
}

/**
 * Runs `read` over every frame in `src`, skipping skippable frames, decodes
 * each frame on its own and checks the result.
 */
function decodeFrames(
  src: Uint8Array,
  magic: number,
  read: (r: FrameReader, start: number) => Frame,
  decode: (frame: Frame) => Uint8Array,
  checksum: (data: Uint8Array) => number,
): Uint8Array {
  const r = new FrameReader(src);
  const out: Uint8Array[] = [];
  if (r.remaining === 0) throw new Error("empty input");
  while (r.remaining > 0) {
    const start = r.pos;
    const m = r.u32("magic number");
    if (isSkippable(m)) {
      r.bytes(r.u32("skippable frame size"), "skippable frame");
      continue;
    }
    if (m !== magic) throw new Error(`bad magic number ${hex(m)} at offset ${start}`);
    const frame = read(r, start);
    const data = decode(frame);
    if (frame.size !== undefined && data.byteLength !== frame.size) {
      throw new Error(`frame at offset ${start} decoded to ${data.byteLength} bytes, expected ${frame.size}`);
    }
    if (frame.checksum !== undefined && checksum(data) !== frame.checksum) {
      throw new Error(`content checksum mismatch in frame at offset ${start}`);
    }
    out.push(data);
  }
  return out.length === 1 && out[0] ? out[0] : concatChunks(out);
}

// ── LZ4 ───────────────────────────────────────────────────────────────────────

function lz4Extra(block: Uint8Array, at: { i: number }): number {
  let n = 0;
  for (;;) {
    if (at.i >= block.length) throw new Error("truncated length in lz4 block");
    const b = block[at.i++];
    n += b;
    if (b !== 255) return n;
  }
}

/**
 * Walks the sequences of a compressed block without decoding it; returns the
 * number of bytes the block produces. `history` is what earlier blocks of a
 * linked frame already produced.
 */
export function lz4BlockSize(block: Uint8Array, history: number): number {
  const at = { i: 0 };
  let produced = 0;
  while (at.i < block.length) {
    const token = block[at.i++];
    let literals = token >> 4;
    if (literals === 15) literals += lz4Extra(block, at);
    if (at.i + literals > block.length) throw new Error("literal run past end of lz4 block");
    at.i += literals;
    produced += literals;
    // The last sequence carries literals only.
    if (at.i === block.length) return produced;
    if (at.i + 2 > block.length) throw new Error("truncated match offset in lz4 block");
    const offset = block[at.i] | (block[at.i + 1] << 8);
    at.i += 2;
    if (offset === 0 || offset > history + produced) throw new Error(`lz4 match offset ${offset} out of range`);
    let match = (token & 15) + 4;
    if ((token & 15) === 15) match += lz4Extra(block, at);
    produced += match;
  }
  throw new Error("lz4 block ends inside a match");
}

function readLz4Frame(r: FrameReader, start: number, hashes: FrameHashes): Frame {
  const flg = r.u8("frame descriptor");
  if (flg >> 6 !== 1) throw new Error(`unsupported lz4 frame version ${flg >> 6}`);
  if (flg & 0x02) throw new Error("reserved bit set in lz4 frame descriptor");
  const linked = (flg & 0x20) === 0;
  const blockChecksums = (flg & 0x10) !== 0;
  const bd = r.u8("block descriptor");
  const maxBlock = LZ4_BLOCK_MAX[(bd >> 4) & 7];
  if (bd & 0x8f || maxBlock === undefined) throw new Error(`invalid lz4 block descriptor ${bd}`);
  const contentSize = flg & 0x08 ? r.u64("content size") : undefined;
  if (flg & 0x01) {
    throw new KompressError("UnsupportedFormat", "lz4 frames with a dictionary id are not supported");
  }
  const descriptor = r.from(start + 4);
  const hc = r.u8("header checksum");
  if (((hashes.h32Raw(descriptor, 0) >>> 8) & 0xff) !== hc) throw new Error("lz4 header checksum mismatch");

  let produced = 0;
  for (;;) {
    const word = r.u32("block size");
    if (word === 0) break;
    const stored = (word & 0x80000000) !== 0;
    const size = word & 0x7fffffff;
    if (size > maxBlock) throw new Error(`lz4 block of ${size} bytes exceeds maximum ${maxBlock}`);
    const block = r.bytes(size, "lz4 block");
    if (blockChecksums && hashes.h32Raw(block, 0) >>> 0 !== r.u32("block checksum")) {
      throw new Error("lz4 block checksum mismatch");
    }
    produced += stored ? size : lz4BlockSize(block, linked ? produced : 0);
  }
  const checksum = flg & 0x04 ? r.u32("content checksum") : undefined;
  if (contentSize !== undefined && contentSize !== produced) {
    throw new Error(`lz4 frame declares ${contentSize} bytes but its blocks hold ${produced}`);
  }
  return { bytes: r.from(start), size: produced, ...(checksum !== undefined ? { checksum } : {}) };
}

/** Decodes every lz4 frame in `src`; `decompress` gets one whole frame at a time. */
export function decodeLz4Frames(src: Uint8Array, decompress: FrameDecompress, hashes: FrameHashes): Uint8Array {
  return decodeFrames(
    src,
    LZ4_MAGIC,
    (r, start) => readLz4Frame(r, start, hashes),
    (frame) => decompress(frame.bytes, frame.size ?? 0),
    (data) => hashes.h32Raw(data, 0) >>> 0,
  );
}

// ── Zstandard ─────────────────────────────────────────────────────────────────

const ZSTD_DICT_ID_SIZE = [0, 1, 2, 4];

function readZstdFrame(r: FrameReader, start: number): Frame {
  const fhd = r.u8("frame header");
  if (fhd & 0x08) throw new Error("reserved bit set in zstd frame header");
  const singleSegment = (fhd & 0x20) !== 0;
  if (!singleSegment) r.u8("window descriptor");
  r.bytes(ZSTD_DICT_ID_SIZE[fhd & 3] ?? 0, "dictionary id");
  let contentSize: number | undefined;
  switch (fhd >> 6) {
    case 0:
      if (singleSegment) contentSize = r.u8("content size");
      break;
    case 1:
      contentSize = r.u16("content size") + 256;
      break;
    case 2:
      contentSize = r.u32("content size");
      break;
    case 3:
      contentSize = r.u64("content size");
      break;
  }

  for (;;) {
    const header = r.u24("block header");
    const size = header >>> 3;
    switch ((header >> 1) & 3) {
      case 0:
        r.bytes(size, "raw block");
        break;
      case 1:
        r.bytes(1, "rle block");
        break;
      case 2:
        if (size > ZSTD_MAX_BLOCK) throw new Error(`zstd block of ${size} bytes exceeds maximum`);
        r.bytes(size, "compressed block");
        break;
      default:
        throw new Error("reserved zstd block type");
    }
    if (header & 1) break;
  }
  const checksum = fhd & 0x04 ? r.u32("content checksum") : undefined;
  return {
    bytes: r.from(start),
    ...(contentSize !== undefined ? { size: contentSize } : {}),
    ...(checksum !== undefined ? { checksum } : {}),
  };
}

/** Decodes every zstd frame in `src`; `decompress` gets one whole frame at a time. */
export function decodeZstdFrames(src: Uint8Array, decompress: FrameDecompress, hashes: FrameHashes): Uint8Array {
  return decodeFrames(
    src,
    ZSTD_MAGIC,
    readZstdFrame,
    (frame) => decompress(frame.bytes, frame.size ?? 0),
    (data) => Number(BigInt.asUintN(32, hashes.h64Raw(data, 0n))),
  );
}
