// Passthrough, the no-op codec. Plain filesystem access with exact stat.

import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "@adviser/cement";
import { KompressError, fromFsError, isSystemError } from "../errors.js";
import { openFileStream } from "../streams.js";
import { BaseAdapter, MISSING, type ChildRef, type PathStat, type WalkEntry } from "./types.js";

/** stat() that reports a missing path instead of throwing. */
export async function statOrMissing(path: string): Promise<PathStat> {
  try {
    const st = await stat(path);
    return { exists: true, isFile: st.isFile(), isDir: st.isDirectory(), size: st.size, mtime: st.mtime };
  } catch (err) {
    if (isSystemError(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) return MISSING;
    throw err;
  }
}

async function listDir(path: string): Promise<Dirent[]> {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch (err) {
    if (isSystemError(err) && err.code === "ENOTDIR") {
      throw new KompressError("UnsupportedOperation", `not a directory: ${path}`, { path, cause: err });
    }
    throw fromFsError(err, path);
  }
}

export class PassthroughAdapter extends BaseAdapter {
  readonly #path: string;

  constructor(path: string, logger: Logger) {
    super(logger);
    this.#path = path;
  }

  openBinary(): Promise<ReadableStream<Uint8Array>> {
    this.logger.Debug().Str("path", this.#path).Msg("open passthrough");
    return openFileStream(this.#path);
  }

  stat(): Promise<PathStat> {
    return statOrMissing(this.#path);
  }

  async *iterdir(): AsyncGenerator<ChildRef> {
    for (const entry of await listDir(this.#path)) {
      yield { path: join(this.#path, entry.name) };
    }
  }

  walk(): AsyncGenerator<WalkEntry> {
    return walkDir(this.#path, "");
  }
}

/** Pre-order; symlinked directories are reported but not followed. */
async function* walkDir(dir: string, relative: string): AsyncGenerator<WalkEntry> {
  for (const entry of await listDir(dir)) {
    const path = join(dir, entry.name);
    const rel = relative === "" ? entry.name : `${relative}/${entry.name}`;
    const isDir = entry.isDirectory();
    yield { path, relative: rel, isDir };
    if (isDir) yield* walkDir(path, rel);
  }
}
