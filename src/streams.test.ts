import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { isKompressError } from "./errors.js";
import {
  bufferedTransform,
  concatChunks,
  fromNodeTransform,
  guardStream,
  openFileStream,
  readFileBytes,
  stream2text,
} from "./streams.js";
import { drain, tempDir, type TempDir } from "./test-fixtures.js";

function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(ctrl): void {
      for (const c of chunks) ctrl.enqueue(c);
      ctrl.close();
    },
  });
}

describe("openFileStream", () => {
  let tmp: TempDir;
  beforeEach(async () => {
    tmp = await tempDir();
  });
  afterEach(async () => {
    await tmp.cleanup();
  });

  it("reads a file in chunks", async () => {
    const file = await tmp.write("a.bin", new Uint8Array([1, 2, 3, 4, 5]));
    const chunks = await drain(await openFileStream(file, 2));
    expect(chunks.map((c) => c.byteLength)).toEqual([2, 2, 1]);
    expect(concatChunks(chunks)).toEqual(new Uint8Array([1, 2, 3, 4, 5]));
  });

  it("fails with NotFound for a missing file", async () => {
    await expect(openFileStream(tmp.path("nope"))).rejects.toSatisfy((e: unknown) => isKompressError(e, "NotFound"));
  });

  it("fails with UnsupportedOperation for a directory", async () => {
    await expect(openFileStream(tmp.dir)).rejects.toSatisfy((e: unknown) => isKompressError(e, "UnsupportedOperation"));
  });

  it("can be cancelled early", async () => {
    const file = await tmp.write("b.bin", new Uint8Array(10));
    const reader = (await openFileStream(file, 4)).getReader();
    const first = await reader.read();
    expect(first.value?.byteLength).toBe(4);
    await reader.cancel();
  });

  it("readFileBytes reads whole files", async () => {
    const file = await tmp.write("c.txt", "hello");
    expect(new TextDecoder().decode(await readFileBytes(file))).toBe("hello");
    await expect(readFileBytes(tmp.path("missing"))).rejects.toSatisfy((e: unknown) => isKompressError(e, "NotFound"));
  });
});

describe("guardStream", () => {
  it("passes chunks through", async () => {
    const out = await drain(guardStream(streamOf([new Uint8Array([1]), new Uint8Array([2])]), (e) => e));
    expect(out).toEqual([new Uint8Array([1]), new Uint8Array([2])]);
  });

  it("rewrites the source error", async () => {
    const failing = new ReadableStream<Uint8Array>({
      pull(ctrl): void {
        ctrl.error(new Error("engine exploded"));
      },
    });
    const guarded = guardStream(failing, (e) => new Error(`wrapped: ${e instanceof Error ? e.message : "?"}`));
    await expect(drain(guarded)).rejects.toThrow("wrapped: engine exploded");
  });
});

describe("bufferedTransform", () => {
  it("decodes the concatenated input once", async () => {
    let calls = 0;
    const t = bufferedTransform((input) => {
      calls++;
      return input.map((b) => b + 1);
    });
    const out = await drain(streamOf([new Uint8Array([1, 2]), new Uint8Array([3])]).pipeThrough(t));
    expect(calls).toBe(1);
    expect(out).toEqual([new Uint8Array([2, 3, 4])]);
  });

  it("emits nothing for empty output", async () => {
    const out = await drain(streamOf([new Uint8Array([9])]).pipeThrough(bufferedTransform(() => new Uint8Array())));
    expect(out).toEqual([]);
  });
});

describe("fromNodeTransform", () => {
  const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

  it("passes chunks through the duplex", async () => {
    const out = await drain(
      streamOf([new Uint8Array([1, 2]), new Uint8Array([3])]).pipeThrough(fromNodeTransform(() => new PassThrough())),
    );
    expect(concatChunks(out)).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("destroys the duplex when output arrives after the reader cancelled", async () => {
    const node = new PassThrough();
    const reader = fromNodeTransform(() => node).readable.getReader();
    await reader.cancel();
    node.push(new Uint8Array([1]));
    await tick();
    expect(node.destroyed).toBe(true);
  });

  it("destroys the duplex when it fails", async () => {
    const node = new PassThrough();
    const reader = fromNodeTransform(() => node).readable.getReader();
    node.emit("error", new Error("decoder failed"));
    await expect(reader.read()).rejects.toThrow("decoder failed");
    expect(node.destroyed).toBe(true);
  });
});

describe("stream2text", () => {
  it("joins every chunk", async () => {
    const text = new ReadableStream<string>({
      start(ctrl): void {
        ctrl.enqueue("ab");
        ctrl.enqueue("");
        ctrl.enqueue("c");
        ctrl.close();
      },
    });
    expect(await stream2text(text)).toBe("abc");
  });
});
