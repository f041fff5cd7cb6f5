// Decode engines — one per single-stream format.
//
//   gzip  DecompressionStream("gzip")           always available
//   xz    lzma-native streaming decompressor    always available
//   zstd  fzstd                                 optional dependency
//   lz4   lz4js                                 optional dependency
//
// Optional engines are loaded once per process; the result is an EngineSet
// capability map. Registry lookups never consult it; only adapters do, when
// bytes are requested, so a missing engine surfaces as UnsupportedFormat at
// open time rather than at classification time. Frames for the buffered
// engines are checked by frames.ts, which hashes with xxhash-wasm.

import lzma from "lzma-native";
import xxhash from "xxhash-wasm";
import { ResolveOnce, type Logger } from "@adviser/cement";
import type { DecompressEngine } from "./formats.js";
import { bufferedTransform, fromNodeTransform } from "./streams.js";
import { KompressError } from "./errors.js";
import { decodeLz4Frames, decodeZstdFrames, type FrameDecompress, type FrameHashes } from "./frames.js";
import { ensureLogger } from "./logger.js";

export interface DecodeEngine {
  readonly name: DecompressEngine;
  decoder(): TransformStream<Uint8Array, Uint8Array>;
}

export type EngineSet = Partial<Record<DecompressEngine, DecodeEngine>>;

// ── Engines ───────────────────────────────────────────────────────────────────

export class GzipDecode implements DecodeEngine {
  readonly name = "gzip";

  decoder(): TransformStream<Uint8Array, Uint8Array> {
    return new DecompressionStream("gzip") as TransformStream<Uint8Array, Uint8Array>;
  }
}

export class XzDecode implements DecodeEngine {
  readonly name = "xz";

  decoder(): TransformStream<Uint8Array, Uint8Array> {
    return fromNodeTransform(() => lzma.createDecompressor());
  }
}

export class ZstdDecode implements DecodeEngine {
  readonly name = "zstd";
  readonly #decompress: FrameDecompress;
  readonly #hashes: FrameHashes;

  constructor(decompress: FrameDecompress, hashes: FrameHashes) {
    this.#decompress = decompress;
    this.#hashes = hashes;
  }

  decoder(): TransformStream<Uint8Array, Uint8Array> {
    return bufferedTransform((input) => decodeZstdFrames(input, this.#decompress, this.#hashes));
  }
}

export class Lz4Decode implements DecodeEngine {
  readonly name = "lz4";
  readonly #decompress: FrameDecompress;
  readonly #hashes: FrameHashes;

  constructor(decompress: FrameDecompress, hashes: FrameHashes) {
    this.#decompress = decompress;
    this.#hashes = hashes;
  }

  decoder(): TransformStream<Uint8Array, Uint8Array> {
    return bufferedTransform((input) => decodeLz4Frames(input, this.#decompress, this.#hashes));
  }
}

// ── Capability check ──────────────────────────────────────────────────────────

async function tryLoad<T>(logger: Logger, name: DecompressEngine, load: () => Promise<T>): Promise<T | undefined> {
  try {
    return await load();
  } catch (err) {
    logger.Debug().Str("engine", name).Err(err).Msg("optional engine not available");
    return undefined;
  }
}

/** Builds the engine set from what can be imported right now. */
export async function loadEngines(logger: Logger = ensureLogger()): Promise<EngineSet> {
  const engines: EngineSet = { gzip: new GzipDecode(), xz: new XzDecode() };
  const hashes = await xxhash();
  const fzstd = await tryLoad(logger, "zstd", () => import("fzstd"));
  if (fzstd) engines.zstd = new ZstdDecode((frame) => fzstd.decompress(frame), hashes);
  const lz4js = await tryLoad(logger, "lz4", () => import("lz4js"));
  if (lz4js) engines.lz4 = new Lz4Decode((frame, size) => lz4js.decompress(frame, size), hashes);
  logger.Debug().Any("engines", Object.keys(engines)).Msg("engines loaded");
  return engines;
}

const defaultEnginesOnce = new ResolveOnce<EngineSet>();

/** The process-wide engine set, loaded on first use. */
export function defaultEngines(): Promise<EngineSet> {
  return defaultEnginesOnce.once(() => loadEngines());
}

/** Fails late: only called when a decompress adapter is about to read. */
export function requireEngine(engines: EngineSet, name: DecompressEngine, path: string): DecodeEngine {
  const engine = engines[name];
  if (!engine) {
    throw new KompressError("UnsupportedFormat", `${name} engine is not installed, cannot read ${path}`, { path });
  }
  return engine;
}
