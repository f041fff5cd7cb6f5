import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, configFromEnv, resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  it("returns defaults", () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it("layers environment under explicit options", () => {
    const env = { KOMPRESS_ENCODING: "latin1", KOMPRESS_DEBUG: "1" };
    expect(resolveConfig({}, env)).toEqual({ encoding: "latin1", debug: true, shortcutSingleMember: true });
    expect(resolveConfig({ encoding: "utf-16le", debug: false }, env)).toEqual({
      encoding: "utf-16le",
      debug: false,
      shortcutSingleMember: true,
    });
  });

  it("rejects ill-typed options", () => {
    expect(() => resolveConfig({ debug: "yes" }, {})).toThrow(/invalid kompress config/);
  });
});

describe("configFromEnv", () => {
  it("reads false-ish flags", () => {
    for (const v of ["0", "false", "NO", "off"]) {
      expect(configFromEnv({ KOMPRESS_DEBUG: v })).toEqual({ debug: false });
    }
    expect(configFromEnv({ KOMPRESS_DEBUG: "" })).toEqual({});
    expect(configFromEnv({})).toEqual({});
  });
});
