import { beforeAll, describe, it, expect } from "vitest";
import { decompress as zstdDecompress } from "fzstd";
import { decompress as lz4Decompress } from "lz4js";
import xxhash from "xxhash-wasm";
import { isKompressError } from "./errors.js";
import { decodeLz4Frames, decodeZstdFrames, lz4BlockSize, type FrameHashes } from "./frames.js";
import { concatChunks } from "./streams.js";
import { corrupt, fixture, lz4, truncate, zstdRaw } from "./test-fixtures.js";

const LZ4_MAGIC = [0x04, 0x22, 0x4d, 0x18];

let hashes: FrameHashes;
let rows: Uint8Array;

beforeAll(async () => {
  hashes = await xxhash();
  rows = await fixture("rows.txt");
});

const unlz4 = (src: Uint8Array): Uint8Array => decodeLz4Frames(src, (f, size) => lz4Decompress(f, size), hashes);
const unzstd = (src: Uint8Array): Uint8Array => decodeZstdFrames(src, (f) => zstdDecompress(f), hashes);

/** An independent-block lz4 frame around one compressed block. */
function lz4Frame(block: number[]): Uint8Array {
  const descriptor = new Uint8Array([0x60, 0x40]);
  const hc = (hashes.h32Raw(descriptor, 0) >>> 8) & 0xff;
  return new Uint8Array([...LZ4_MAGIC, ...descriptor, hc, block.length, 0, 0, 0, ...block, 0, 0, 0, 0]);
}

describe("lz4 frames", () => {
  it("decodes a frame written by the lz4 tool", async () => {
    expect(unlz4(await fixture("rows.txt.lz4"))).toEqual(rows);
  });

  it("decodes concatenated frames", () => {
    expect(new TextDecoder().decode(unlz4(concatChunks([lz4("first "), lz4("second")])))).toBe("first second");
  });

  it("rejects a changed literal by its content checksum", async () => {
    const bad = corrupt(await fixture("rows.txt.lz4"), 25, 1);
    expect(() => unlz4(bad)).toThrow("content checksum mismatch in frame at offset 0");
  });

  it("rejects a frame cut before its EndMark", async () => {
    const bad = truncate(await fixture("rows.txt.lz4"));
    expect(() => unlz4(bad)).toThrow("truncated block size at offset 77: need 4 bytes, have 2");
  });

  it("rejects a truncated frame without checksums", () => {
    expect(() => unlz4(truncate(lz4("lz4 text that loses its tail")))).toThrow(/^truncated lz4 block at offset \d+/);
  });

  it("rejects a damaged header checksum", async () => {
    const bad = corrupt(await fixture("rows.txt.lz4"), 14, 1);
    expect(() => unlz4(bad)).toThrow("lz4 header checksum mismatch");
  });

  it("rejects a match reaching before the output", () => {
    expect(() => unlz4(lz4Frame([0x10, 0x61, 0x05, 0x00]))).toThrow("lz4 match offset 5 out of range");
  });

  it("reports dictionary frames as unsupported", () => {
    const frame = new Uint8Array([...LZ4_MAGIC, 0x61, 0x40, 1, 2, 3, 4, 0]);
    let caught: unknown;
    try {
      unlz4(frame);
    } catch (err) {
      caught = err;
    }
    expect(isKompressError(caught, "UnsupportedFormat")).toBe(true);
  });

  it("sizes blocks without decoding them", () => {
    expect(lz4BlockSize(new Uint8Array([0x10, 0x61, 0x01, 0x00, 0x10, 0x62]), 0)).toBe(6);
    expect(() => lz4BlockSize(new Uint8Array([0x10, 0x61, 0x01, 0x00]), 0)).toThrow("lz4 block ends inside a match");
    expect(() => lz4BlockSize(new Uint8Array([0x50, 0x61]), 0)).toThrow("literal run past end of lz4 block");
  });
});

describe("zstd frames", () => {
  it("decodes a frame written by the zstd tool", async () => {
    expect(unzstd(await fixture("rows.txt.zst"))).toEqual(rows);
  });

  it("skips skippable frames between data frames", () => {
    const skippable = new Uint8Array([0x50, 0x2a, 0x4d, 0x18, 2, 0, 0, 0, 0xaa, 0xbb]);
    const src = concatChunks([zstdRaw("ab"), skippable, zstdRaw("cd")]);
    expect(new TextDecoder().decode(unzstd(src))).toBe("abcd");
  });

  it("rejects a changed literal by its content checksum", async () => {
    const bad = corrupt(await fixture("rows.txt.zst"), 20, 1);
    expect(() => unzstd(bad)).toThrow("content checksum mismatch in frame at offset 0");
  });

  it("rejects a truncated frame", async () => {
    const bad = truncate(await fixture("rows.txt.zst"));
    expect(() => unzstd(bad)).toThrow("truncated compressed block at offset 10: need 71 bytes, have 69");
  });

  it("rejects the reserved block type", () => {
    const frame = zstdRaw("abc");
    frame[6] = frame[6] | 0x06;
    expect(() => unzstd(frame)).toThrow("reserved zstd block type");
  });

  it("rejects foreign and empty input", () => {
    expect(() => unzstd(new Uint8Array([1, 2, 3, 4, 5]))).toThrow("bad magic number 0x04030201 at offset 0");
    expect(() => unzstd(new Uint8Array())).toThrow("empty input");
  });
});
