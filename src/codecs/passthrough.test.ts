import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { isKompressError } from "../errors.js";
import { ensureLogger } from "../logger.js";
import { concatChunks } from "../streams.js";
import { collect, drain, tempDir, type TempDir } from "../test-fixtures.js";
import { PassthroughAdapter, statOrMissing } from "./passthrough.js";

describe("PassthroughAdapter", () => {
  let tmp: TempDir;
  const logger = ensureLogger();
  beforeEach(async () => {
    tmp = await tempDir();
  });
  afterEach(async () => {
    await tmp.cleanup();
  });

  it("reads bytes and text unchanged", async () => {
    const file = await tmp.write("plain.txt", "grüße\n");
    const a = new PassthroughAdapter(file, logger);
    expect(concatChunks(await drain(await a.openBinary()))).toEqual(new TextEncoder().encode("grüße\n"));
    expect((await drain(await a.openText("utf-8"))).join("")).toBe("grüße\n");
  });

  it("reports exact stat", async () => {
    const file = await tmp.write("five.txt", "12345");
    expect(await new PassthroughAdapter(file, logger).stat()).toMatchObject({
      exists: true,
      isFile: true,
      isDir: false,
      size: 5,
    });
    expect(await new PassthroughAdapter(tmp.dir, logger).stat()).toMatchObject({ exists: true, isDir: true });
    expect(await statOrMissing(tmp.path("gone"))).toEqual({ exists: false, isFile: false, isDir: false });
  });

  it("rejects an unknown encoding", async () => {
    const file = await tmp.write("x.txt", "x");
    await expect(new PassthroughAdapter(file, logger).openText("klingon-8")).rejects.toSatisfy((e: unknown) =>
      isKompressError(e, "UnsupportedOperation"),
    );
  });

  it("fails text decoding on invalid bytes", async () => {
    const file = await tmp.write("bad.txt", new Uint8Array([0xff, 0xfe, 0xfd]));
    await expect(drain(await new PassthroughAdapter(file, logger).openText("utf-8"))).rejects.toThrow();
  });

  it("lists directories", async () => {
    await tmp.write("d/a.txt", "a");
    await tmp.write("d/sub/b.txt", "b");
    const a = new PassthroughAdapter(tmp.path("d"), logger);
    const names = (await collect(a.iterdir())).map((c) => c.path).sort();
    expect(names).toEqual([tmp.path("d/a.txt"), tmp.path("d/sub")]);
    const rel = (await collect(a.walk())).map((e) => [e.relative, e.isDir]).sort();
    expect(rel).toEqual([
      ["a.txt", false],
      ["sub", true],
      ["sub/b.txt", false],
    ]);
  });

  it("refuses to list a file", async () => {
    const file = await tmp.write("f.txt", "f");
    await expect(collect(new PassthroughAdapter(file, logger).iterdir())).rejects.toSatisfy((e: unknown) =>
      isKompressError(e, "UnsupportedOperation"),
    );
    await expect(collect(new PassthroughAdapter(tmp.path("none"), logger).iterdir())).rejects.toSatisfy(
      (e: unknown) => isKompressError(e, "NotFound"),
    );
  });
});
