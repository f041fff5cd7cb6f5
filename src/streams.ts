// Stream plumbing shared by the codec adapters.
//
//   openFileStream     — fs file → ReadableStream, handle closed on end/cancel/error
//   readFileBytes      — whole file as bytes (archives and buffered engines)
//   guardStream        — re-emits a stream, rewriting the error it fails with
//   bufferedTransform  — TransformStream for engines that decode whole inputs
//   fromNodeTransform  — wraps a node:stream duplex as a web TransformStream
//   stream2text        — drains decoded text into one string

import { open, readFile } from "node:fs/promises";
import type { Duplex } from "node:stream";
import { KompressError, fromFsError } from "./errors.js";

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

// ── Files ─────────────────────────────────────────────────────────────────────

/**
 * Opens `path` for reading. Fails up front with NotFound / UnsupportedOperation
 * (directory); afterwards the handle lives exactly as long as the stream.
 */
export async function openFileStream(path: string, chunkSize = DEFAULT_CHUNK_SIZE): Promise<ReadableStream<Uint8Array>> {
  const fh = await open(path, "r").catch((err: unknown) => {
    throw fromFsError(err, path);
  });
  try {
    if ((await fh.stat()).isDirectory()) {
      throw new KompressError("UnsupportedOperation", `is a directory: ${path}`, { path });
    }
  } catch (err) {
    await fh.close();
    throw err;
  }

  let closed = false;
  const release = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await fh.close();
  };

  return new ReadableStream<Uint8Array>({
    async pull(ctrl): Promise<void> {
      try {
        const buf = new Uint8Array(chunkSize);
        const { bytesRead } = await fh.read(buf, 0, chunkSize, null);
        if (bytesRead === 0) {
          await release();
          ctrl.close();
          return;
        }
        ctrl.enqueue(buf.subarray(0, bytesRead));
      } catch (err) {
        await release().catch(() => undefined);
        ctrl.error(fromFsError(err, path));
      }
    },
    async cancel(): Promise<void> {
      await release();
    },
  });
}

export async function readFileBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (err) {
    throw fromFsError(err, path);
  }
}

// ── Error rewriting ───────────────────────────────────────────────────────────

/**
 * Pulls from `source` and re-emits every chunk; if `source` errors, the
 * returned stream errors with `rewrite(err)` instead.
 */
export function guardStream<T>(source: ReadableStream<T>, rewrite: (err: unknown) => unknown): ReadableStream<T> {
  const reader = source.getReader();
  return new ReadableStream<T>({
    async pull(ctrl): Promise<void> {
      let res: ReadableStreamReadResult<T>;
      try {
        res = await reader.read();
      } catch (err) {
        ctrl.error(rewrite(err));
        return;
      }
      if (res.done) {
        ctrl.close();
        return;
      }
      ctrl.enqueue(res.value);
    },
    async cancel(reason): Promise<void> {
      await reader.cancel(reason);
    },
  });
}

// ── Transforms ────────────────────────────────────────────────────────────────

export function concatChunks(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((s, c) => s + c.byteLength, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const c of chunks) {
    out.set(c, o);
    o += c.byteLength;
  }
  return out;
}

/**
 * Collects the whole input, then emits `decode(input)` once on flush.
 * For engines whose decoders take a complete buffer.
 */
export function bufferedTransform(decode: (input: Uint8Array) => Uint8Array): TransformStream<Uint8Array, Uint8Array> {
  const chunks: Uint8Array[] = [];
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk): void {
      chunks.push(chunk);
    },
    flush(ctrl): void {
      const out = decode(concatChunks(chunks));
      chunks.length = 0;
      if (out.byteLength > 0) ctrl.enqueue(out);
    },
  });
}

/**
 * Bridges a node:stream duplex (zlib-style decompressor) into a web
 * TransformStream. Writes honour the duplex's write callback; flush ends the
 * duplex and waits for its 'end'. Errors from the duplex error the stream,
 * and the duplex is destroyed once either side gives up.
 */
export function fromNodeTransform(make: () => Duplex): TransformStream<Uint8Array, Uint8Array> {
  let node: Duplex | undefined;
  const duplex = (): Duplex => {
    if (!node) throw new Error("node transform used before start()");
    return node;
  };
  return new TransformStream<Uint8Array, Uint8Array>({
    start(ctrl): void {
      const d = make();
      node = d;
      d.on("data", (chunk: Uint8Array) => {
        try {
          ctrl.enqueue(new Uint8Array(chunk));
        } catch {
          // enqueue only throws once the reader has cancelled; nothing will read the rest.
          d.destroy();
        }
      });
      d.on("error", (err: unknown) => {
        ctrl.error(err);
        d.destroy();
      });
    },
    transform(chunk): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        duplex().write(chunk, (err?: Error | null) => (err ? reject(err) : resolve()));
      });
    },
    flush(): Promise<void> {
      const d = duplex();
      return new Promise<void>((resolve, reject) => {
        d.once("end", resolve);
        d.once("error", reject);
        d.end();
      });
    },
  });
}

/** Drains a text stream into one string. */
export async function stream2text(stream: ReadableStream<string>): Promise<string> {
  const reader = stream.getReader();
  let out = "";
  while (true) {
    const { done, value } = await reader.read();
    if (done) return out;
    out += value;
  }
}
