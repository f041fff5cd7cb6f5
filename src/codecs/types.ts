import type { Logger } from "@adviser/cement";
import { KompressError } from "../errors.js";

/** Stat-like result reported by every adapter. */
export interface PathStat {
  exists: boolean;
  isFile: boolean;
  isDir: boolean;
  /** Decoded size in bytes, when known without decoding. */
  size?: number;
  mtime?: Date;
}

export const MISSING: PathStat = { exists: false, isFile: false, isDir: false };

/**
 * A child location produced by directory iteration: a plain path, or an
 * archive path plus the member inside it.
 */
export interface ChildRef {
  path: string;
  member?: string;
}

/** A descendant together with its `/`-separated path relative to the walk root. */
export interface WalkEntry extends ChildRef {
  relative: string;
  isDir: boolean;
}

/**
 * The capability set every codec implements, so callers can be written
 * against this rather than a concrete format.
 *
 * - `openBinary()` — decoded bytes.
 * - `openText()`   — decoded characters in `encoding`.
 * - `stat()`       — existence and kind; never throws NotFound.
 * - `iterdir()`    — immediate children of a directory-like location.
 * - `walk()`       — all descendants, depth-first pre-order, in listing order.
 */
export interface CodecAdapter {
  openBinary(): Promise<ReadableStream<Uint8Array>>;
  openText(encoding: string): Promise<ReadableStream<string>>;
  stat(): Promise<PathStat>;
  iterdir(): AsyncGenerator<ChildRef>;
  walk(): AsyncGenerator<WalkEntry>;
}

export function assertEncoding(encoding: string): void {
  try {
    new TextDecoder(encoding);
  } catch (err) {
    throw new KompressError("UnsupportedOperation", `unknown text encoding: ${encoding}`, { cause: err });
  }
}

/** Shared `openText()`: text is always the binary stream run through a decoder. */
export abstract class BaseAdapter implements CodecAdapter {
  protected readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  abstract openBinary(): Promise<ReadableStream<Uint8Array>>;
  abstract stat(): Promise<PathStat>;
  abstract iterdir(): AsyncGenerator<ChildRef>;
  abstract walk(): AsyncGenerator<WalkEntry>;

  async openText(encoding: string): Promise<ReadableStream<string>> {
    assertEncoding(encoding);
    const bytes = await this.openBinary();
    return bytes.pipeThrough(new TextDecoderStream(encoding, { fatal: true }) as TransformStream<Uint8Array, string>);
  }
}
