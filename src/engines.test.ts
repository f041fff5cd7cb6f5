import { describe, it, expect } from "vitest";
import { GzipDecode, defaultEngines, loadEngines, requireEngine } from "./engines.js";
import { isKompressError } from "./errors.js";
import { concatChunks } from "./streams.js";
import { drain, gz, lz4, xz, zstdRaw } from "./test-fixtures.js";

async function decode(bytes: Uint8Array, t: TransformStream<Uint8Array, Uint8Array>): Promise<string> {
  const src = new ReadableStream<Uint8Array>({
    start(ctrl): void {
      ctrl.enqueue(bytes);
      ctrl.close();
    },
  });
  return new TextDecoder().decode(concatChunks(await drain(src.pipeThrough(t))));
}

describe("engines", () => {
  it("always provides gzip and xz", async () => {
    const engines = await loadEngines();
    expect(engines.gzip?.name).toBe("gzip");
    expect(engines.xz?.name).toBe("xz");
  });

  it("loads the default set once", async () => {
    expect(await defaultEngines()).toBe(await defaultEngines());
  });

  it("decodes each format", async () => {
    const engines = await loadEngines();
    expect(await decode(gz("gzip text"), requireEngine(engines, "gzip", "t.gz").decoder())).toBe("gzip text");
    expect(await decode(await xz("xz text"), requireEngine(engines, "xz", "t.xz").decoder())).toBe("xz text");
    expect(await decode(zstdRaw("zstd text"), requireEngine(engines, "zstd", "t.zst").decoder())).toBe("zstd text");
    expect(await decode(lz4("lz4 text"), requireEngine(engines, "lz4", "t.lz4").decoder())).toBe("lz4 text");
  });

  it("requireEngine fails with UnsupportedFormat", () => {
    const engines = { gzip: new GzipDecode() };
    expect(requireEngine(engines, "gzip", "a.gz").name).toBe("gzip");
    expect(() => requireEngine(engines, "zstd", "a.zst")).toThrow(/zstd engine is not installed, cannot read a.zst/);
    let caught: unknown;
    try {
      requireEngine(engines, "lz4", "a.lz4");
    } catch (err) {
      caught = err;
    }
    expect(isKompressError(caught, "UnsupportedFormat")).toBe(true);
  });
});
