// Format registry — maps file names onto codec kinds.
//
// Detection is purely syntactic: the final path component is matched,
// case-sensitively, against an ordered suffix table. The first row that
// matches wins, so multi-segment suffixes (".tar.gz") must precede the
// single-segment suffixes they end with (".gz"). No match → passthrough.

import { basename } from "node:path";

export const Ext = {
  xz: ".xz",
  zip: ".zip",
  lz4: ".lz4",
  zstd: ".zstd",
  zst: ".zst",
  targz: ".tar.gz",
  gz: ".gz",
} as const;
export type Ext = (typeof Ext)[keyof typeof Ext];

export type DecompressEngine = "xz" | "lz4" | "zstd" | "gzip";
export type ArchiveEngine = "tar+gzip" | "zip";

export type CodecKind =
  | { kind: "passthrough" }
  | { kind: "decompress"; engine: DecompressEngine }
  | { kind: "archive"; engine: ArchiveEngine };

export interface FormatDescriptor {
  ext: Ext;
  codec: CodecKind;
}

export const PASSTHROUGH: CodecKind = { kind: "passthrough" };

// ── Registry table ────────────────────────────────────────────────────────────

export const FORMATS: readonly FormatDescriptor[] = [
  { ext: Ext.targz, codec: { kind: "archive", engine: "tar+gzip" } },
  { ext: Ext.xz, codec: { kind: "decompress", engine: "xz" } },
  { ext: Ext.zip, codec: { kind: "archive", engine: "zip" } },
  { ext: Ext.lz4, codec: { kind: "decompress", engine: "lz4" } },
  { ext: Ext.zstd, codec: { kind: "decompress", engine: "zstd" } },
  { ext: Ext.zst, codec: { kind: "decompress", engine: "zstd" } },
  { ext: Ext.gz, codec: { kind: "decompress", engine: "gzip" } },
];

/** Anything that carries a final name component, e.g. a {@link KPath}. */
export interface PathLike {
  readonly name: string;
}

function nameOf(path: string | PathLike): string {
  return typeof path === "string" ? basename(path) : path.name;
}

/** Looks up the codec for a bare file name. */
export function codecOf(name: string): CodecKind {
  return FORMATS.find((f) => name.endsWith(f.ext))?.codec ?? PASSTHROUGH;
}

/**
 * Resolves the codec for a path. Pure and total: never touches the
 * filesystem, never throws, and falls back to passthrough.
 */
export function resolveCodec(path: string | PathLike): CodecKind {
  return codecOf(nameOf(path));
}

/**
 * Does this path's name match a known compressed or archive format?
 * Useful for branching without constructing a {@link KPath}.
 */
export function isCompressed(path: string | PathLike): boolean {
  return resolveCodec(path).kind !== "passthrough";
}

export function describeCodec(codec: CodecKind): string {
  switch (codec.kind) {
    case "passthrough":
      return "passthrough";
    case "decompress":
    case "archive":
      return codec.engine;
  }
}
