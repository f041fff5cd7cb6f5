import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { GzipDecode, loadEngines, type EngineSet } from "../engines.js";
import { isKompressError } from "../errors.js";
import { ensureLogger } from "../logger.js";
import { collect, corrupt, drain, gz, lz4, tempDir, xz, zstdRaw, type TempDir } from "../test-fixtures.js";
import { DecompressAdapter } from "./decompress.js";

const TEXT = "line one\nline two\n";

describe("DecompressAdapter", () => {
  let tmp: TempDir;
  let engines: EngineSet;
  const logger = ensureLogger();
  beforeEach(async () => {
    tmp = await tempDir();
    engines = await loadEngines(logger);
  });
  afterEach(async () => {
    await tmp.cleanup();
  });

  it("round-trips text through every engine", async () => {
    const cases = [
      { file: await tmp.write("t.gz", gz(TEXT)), engine: "gzip" },
      { file: await tmp.write("t.xz", await xz(TEXT)), engine: "xz" },
      { file: await tmp.write("t.zst", zstdRaw(TEXT)), engine: "zstd" },
      { file: await tmp.write("t.lz4", lz4(TEXT)), engine: "lz4" },
    ] as const;
    for (const c of cases) {
      const a = new DecompressAdapter(c.file, c.engine, engines, logger);
      expect((await drain(await a.openText("utf-8"))).join("")).toBe(TEXT);
    }
  });

  it("stats as a file without a decoded size", async () => {
    const file = await tmp.write("s.gz", gz(TEXT));
    const st = await new DecompressAdapter(file, "gzip", engines, logger).stat();
    expect(st.exists).toBe(true);
    expect(st.isFile).toBe(true);
    expect(st.isDir).toBe(false);
    expect(st.size).toBeUndefined();
    expect(await new DecompressAdapter(tmp.path("none.gz"), "gzip", engines, logger).stat()).toEqual({
      exists: false,
      isFile: false,
      isDir: false,
    });
  });

  it("fails with NotFound for a missing file", async () => {
    await expect(new DecompressAdapter(tmp.path("gone.xz"), "xz", engines, logger).openBinary()).rejects.toSatisfy(
      (e: unknown) => isKompressError(e, "NotFound"),
    );
  });

  it("fails with UnsupportedFormat when the engine is missing", async () => {
    const file = await tmp.write("z.zst", zstdRaw(TEXT));
    const only: EngineSet = { gzip: new GzipDecode() };
    await expect(new DecompressAdapter(file, "zstd", only, logger).openBinary()).rejects.toSatisfy((e: unknown) =>
      isKompressError(e, "UnsupportedFormat"),
    );
  });

  it("fails with CorruptData on damaged input", async () => {
    const gzFile = await tmp.write("bad.gz", corrupt(gz(TEXT)));
    const xzFile = await tmp.write("bad.xz", corrupt(await xz(TEXT)));
    for (const [file, engine] of [
      [gzFile, "gzip"],
      [xzFile, "xz"],
    ] as const) {
      const stream = await new DecompressAdapter(file, engine, engines, logger).openBinary();
      await expect(drain(stream)).rejects.toSatisfy((e: unknown) => isKompressError(e, "CorruptData"));
    }
  });

  it("is not a directory", async () => {
    const file = await tmp.write("d.gz", gz(TEXT));
    await expect(collect(new DecompressAdapter(file, "gzip", engines, logger).iterdir())).rejects.toSatisfy(
      (e: unknown) => isKompressError(e, "UnsupportedOperation"),
    );
  });
});
