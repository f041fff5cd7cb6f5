// Single-stream decompression: one compressed file, one decoded byte stream.
//
// The engine is looked up only when bytes are requested, so a missing optional
// engine fails here with UnsupportedFormat. Any error raised by the engine
// while decoding is rewritten to CorruptData.

import type { Logger } from "@adviser/cement";
import { KompressError, toCorruptData } from "../errors.js";
import { requireEngine, type EngineSet } from "../engines.js";
import type { DecompressEngine } from "../formats.js";
import { guardStream, openFileStream } from "../streams.js";
import { statOrMissing } from "./passthrough.js";
import { BaseAdapter, type ChildRef, type PathStat, type WalkEntry } from "./types.js";

export class DecompressAdapter extends BaseAdapter {
  readonly #path: string;
  readonly #engine: DecompressEngine;
  readonly #engines: EngineSet;

  constructor(path: string, engine: DecompressEngine, engines: EngineSet, logger: Logger) {
    super(logger);
    this.#path = path;
    this.#engine = engine;
    this.#engines = engines;
  }

  async openBinary(): Promise<ReadableStream<Uint8Array>> {
    const engine = requireEngine(this.#engines, this.#engine, this.#path);
    const source = await openFileStream(this.#path);
    this.logger.Debug().Str("path", this.#path).Str("engine", this.#engine).Msg("open decompress");
    return guardStream(source.pipeThrough(engine.decoder()), (err) =>
      toCorruptData(err, { path: this.#path, engine: this.#engine }),
    );
  }

  // The decoded size is not known without decoding the whole stream.
  async stat(): Promise<PathStat> {
    const st = await statOrMissing(this.#path);
    return { exists: st.exists, isFile: st.isFile, isDir: false, ...(st.mtime ? { mtime: st.mtime } : {}) };
  }

  async *iterdir(): AsyncGenerator<ChildRef> {
    throw this.#notADirectory();
  }

  async *walk(): AsyncGenerator<WalkEntry> {
    throw this.#notADirectory();
  }

  #notADirectory(): KompressError {
    return new KompressError("UnsupportedOperation", `${this.#engine} file is not a directory: ${this.#path}`, {
      path: this.#path,
    });
  }
}
