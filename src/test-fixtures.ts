// Fixture builders for the test suites: each writes a freshly encoded file
// into a per-test temp directory using the same engines the readers use.

import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { gzipSync, strToU8, zipSync } from "fflate";
import lzma from "lzma-native";
import { compress as lz4Compress } from "lz4js";
import { pack } from "tar-stream";
import { concatChunks } from "./streams.js";

export interface TempDir {
  dir: string;
  path(name: string): string;
  write(name: string, bytes: Uint8Array | string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function tempDir(): Promise<TempDir> {
  const dir = await mkdtemp(join(tmpdir(), "kompress-"));
  return {
    dir,
    path: (name): string => join(dir, name),
    write: async (name, bytes): Promise<string> => {
      const file = join(dir, name);
      await mkdir(dirname(file), { recursive: true });
      await writeFile(file, bytes);
      return file;
    },
    cleanup: (): Promise<void> => rm(dir, { recursive: true, force: true }),
  };
}

// ── Checked-in frames ─────────────────────────────────────────────────────────
//
// fixtures/rows.txt compressed by the reference lz4 and zstd command-line
// tools (content checksums on; lz4 also records the content size).

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export async function fixture(name: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(fixturePath(name)));
}

// ── Single-stream encoders ────────────────────────────────────────────────────

export function gz(text: string): Uint8Array {
  return gzipSync(strToU8(text));
}

export async function xz(text: string): Promise<Uint8Array> {
  return new Uint8Array(await lzma.compress(Buffer.from(text, "utf8")));
}

export function lz4(text: string): Uint8Array {
  return lz4Compress(strToU8(text));
}

/**
 * A zstd frame holding `text` as one raw (stored) block. Single-segment
 * header with a one-byte content size, so `text` must stay under 256 bytes.
 */
export function zstdRaw(text: string): Uint8Array {
  const body = strToU8(text);
  if (body.byteLength > 255) throw new Error("zstdRaw: content too long");
  const blockHeader = 1 | (body.byteLength << 3);
  return new Uint8Array([
    0x28,
    0xb5,
    0x2f,
    0xfd,
    0x20,
    body.byteLength,
    blockHeader & 0xff,
    (blockHeader >> 8) & 0xff,
    (blockHeader >> 16) & 0xff,
    ...body,
  ]);
}

// ── Archive builders ──────────────────────────────────────────────────────────

/** Zip with members in the given order; names ending in "/" are directories. */
export function zip(members: [name: string, content: string][], mtime?: Date): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const [name, content] of members) files[name] = strToU8(content);
  return zipSync(files, mtime ? { mtime } : {});
}

export interface TarEntry {
  name: string;
  content?: string;
  dir?: boolean;
}

export async function tarGz(entries: TarEntry[]): Promise<Uint8Array> {
  const p = pack();
  const chunks: Uint8Array[] = [];
  const done = new Promise<void>((resolve, reject) => {
    p.on("data", (chunk: Uint8Array) => chunks.push(chunk));
    p.on("end", resolve);
    p.on("error", reject);
  });
  for (const e of entries) {
    if (e.dir) p.entry({ name: e.name, type: "directory" });
    else p.entry({ name: e.name }, e.content ?? "");
  }
  p.finalize();
  await done;
  return gzipSync(concatChunks(chunks));
}

/** Returns a copy of `bytes` with `count` bytes from `offset` inverted. */
export function corrupt(bytes: Uint8Array, offset = 0, count = 4): Uint8Array {
  const out = bytes.slice();
  for (let i = offset; i < Math.min(offset + count, out.length); i++) out[i] = out[i] ^ 0xff;
  return out;
}

/** `bytes` without its last `count` bytes. */
export function truncate(bytes: Uint8Array, count = 6): Uint8Array {
  return bytes.slice(0, bytes.length - count);
}

// ── Stream helpers ────────────────────────────────────────────────────────────

export async function drain<T>(stream: ReadableStream<T>): Promise<T[]> {
  const reader = stream.getReader();
  const out: T[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    out.push(value);
  }
  return out;
}

export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const v of iter) out.push(v);
  return out;
}
