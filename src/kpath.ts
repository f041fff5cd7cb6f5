// KPath — a path that reads through compression and archives.
//
// Construction is pure: the name is classified once and nothing is opened.
// Every I/O call builds a fresh codec adapter, so a KPath holds no handles and
// no cached listings. A compound reference (archive path + member) addresses a
// member inside a zip or tar.gz archive.
//
//   const p = new KPath("logs/app.log.xz");
//   await p.readText();
//   for await (const child of new KPath("bundle.zip").iterdir()) { ... }

import { dirname, isAbsolute, join, relative, sep } from "node:path";
import type { Logger } from "@adviser/cement";
import { stream2uint8array } from "@adviser/cement/utils";
import { minimatch } from "minimatch";
import { ArchiveAdapter } from "./archive/resolver.js";
import { memberSegments, normaliseMemberPath, type ArchiveMember } from "./archive/tree.js";
import { DecompressAdapter } from "./codecs/decompress.js";
import { PassthroughAdapter } from "./codecs/passthrough.js";
import type { ChildRef, CodecAdapter, PathStat } from "./codecs/types.js";
import { resolveConfig, type KompressOptions, type ResolvedConfig } from "./config.js";
import { defaultEngines } from "./engines.js";
import { KompressError } from "./errors.js";
import { codecOf, describeCodec, type CodecKind } from "./formats.js";
import { ensureLogger } from "./logger.js";
import { stream2text } from "./streams.js";

/** One directory of a walk: its location and its sorted child names. */
export interface WalkStep {
  dir: KPath;
  dirs: string[];
  files: string[];
}

interface WalkLevel {
  ref?: ChildRef;
  dirs: string[];
  files: string[];
}

export class KPath {
  /** Filesystem path; the archive's own path for compound references. */
  readonly path: string;
  /** Normalised member path inside the archive, if any. */
  readonly member?: string;
  /** Codec of the file at `path`. */
  readonly codec: CodecKind;

  readonly #opts: KompressOptions;
  readonly #config: ResolvedConfig;
  readonly #logger: Logger;

  constructor(path: string | KPath, member?: string, opts?: KompressOptions) {
    const base: { path: string; member?: string; opts: KompressOptions } =
      typeof path === "string" ? { path, opts: {} } : path.#parts();
    this.path = base.path;
    const joined = [base.member, member].filter((m): m is string => m !== undefined).join("/");
    if (base.member !== undefined || member !== undefined) this.member = normaliseMemberPath(joined);
    this.#opts = opts ?? base.opts;
    this.#config = resolveConfig(serialisable(this.#opts));
    this.#logger = ensureLogger({ logger: this.#opts.logger, debug: this.#config.debug });
    this.codec = this.#opts.codec ?? codecOf(nameOf(this.path));
  }

  static from(path: string | KPath, member?: string, opts?: KompressOptions): KPath {
    return new KPath(path, member, opts);
  }

  #parts(): { path: string; member?: string; opts: KompressOptions } {
    return { path: this.path, ...(this.member !== undefined ? { member: this.member } : {}), opts: this.#opts };
  }

  #derive(path: string, member?: string): KPath {
    const { codec, ...inherited } = this.#opts;
    // An explicit codec sticks to members of the same file only.
    return new KPath(path, member, path === this.path && codec ? { ...inherited, codec } : inherited);
  }

  // ── Path metadata ───────────────────────────────────────────────────────────

  /** Final component: the member's own name for compound references. */
  get name(): string {
    if (this.member !== undefined) {
      const segs = memberSegments(this.member);
      const last = segs[segs.length - 1];
      if (last !== undefined) return last;
    }
    return nameOf(this.path);
  }

  get suffixes(): string[] {
    const name = this.name;
    if (name.endsWith(".")) return [];
    return name
      .replace(/^\.+/, "")
      .split(".")
      .slice(1)
      .map((s) => `.${s}`);
  }

  get suffix(): string {
    return this.suffixes[this.suffixes.length - 1] ?? "";
  }

  get stem(): string {
    const suffix = this.suffix;
    return suffix === "" ? this.name : this.name.slice(0, -suffix.length);
  }

  /** Walks up the member path first, then up the filesystem. */
  get parent(): KPath {
    if (this.member !== undefined && this.member !== "") {
      const segs = memberSegments(this.member);
      return segs.length > 1 ? this.#derive(this.path, segs.slice(0, -1).join("/")) : this.#derive(this.path);
    }
    return this.#derive(dirname(this.path));
  }

  get parts(): string[] {
    const root = isAbsolute(this.path) ? [sep] : [];
    const segs = this.path.split(sep).filter((s) => s !== "");
    return [...root, ...segs, ...memberSegments(this.member ?? "")];
  }

  /** Joins below this path; joining below an archive addresses its members. */
  join(...segments: string[]): KPath {
    if (this.member !== undefined || this.codec.kind === "archive") {
      return this.#derive(this.path, [this.member ?? "", ...segments].join("/"));
    }
    return this.#derive(join(this.path, ...segments));
  }

  /**
   * The part of this path below `other`: a member path when both address the
   * same archive, a filesystem path otherwise.
   */
  relativeTo(other: KPath): string {
    if (this.member === undefined && other.member === undefined) {
      const rel = relative(other.path, this.path);
      if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) throw this.#notBelow(other);
      return rel;
    }
    if (this.path !== other.path) throw this.#notBelow(other);
    const base = memberSegments(other.member ?? "");
    const segs = memberSegments(this.member ?? "");
    if (base.length > segs.length || base.some((s, i) => segs[i] !== s)) throw this.#notBelow(other);
    return segs.slice(base.length).join("/");
  }

  #notBelow(other: KPath): KompressError {
    return new KompressError("UnsupportedOperation", `${this.toString()} is not below ${other.toString()}`, {
      path: this.path,
      ...(this.member !== undefined ? { member: this.member } : {}),
    });
  }

  toString(): string {
    return this.member ? `${this.path}/${this.member}` : this.path;
  }

  equals(other: KPath): boolean {
    return this.path === other.path && (this.member ?? "") === (other.member ?? "");
  }

  compare(other: KPath): number {
    const a = this.toString();
    const b = other.toString();
    return a < b ? -1 : a > b ? 1 : 0;
  }

  // ── I/O ─────────────────────────────────────────────────────────────────────

  async openBinary(): Promise<ReadableStream<Uint8Array>> {
    return (await this.#adapter()).openBinary();
  }

  async openText(encoding: string = this.#config.encoding): Promise<ReadableStream<string>> {
    return (await this.#adapter()).openText(encoding);
  }

  async readBytes(): Promise<Uint8Array> {
    return stream2uint8array(await this.openBinary());
  }

  async readText(encoding?: string): Promise<string> {
    return stream2text(await this.openText(encoding));
  }

  async stat(): Promise<PathStat> {
    return (await this.#adapter()).stat();
  }

  async exists(): Promise<boolean> {
    return (await this.stat()).exists;
  }

  async isFile(): Promise<boolean> {
    return (await this.stat()).isFile;
  }

  async isDir(): Promise<boolean> {
    return (await this.stat()).isDir;
  }

  async *iterdir(): AsyncGenerator<KPath> {
    for await (const ref of (await this.#adapter()).iterdir()) {
      yield this.#child(ref);
    }
  }

  /**
   * Top-down walk, one step per directory starting with this one; names are
   * sorted and each directory's subdirectories are walked in that order.
   * Names removed from a step's `dirs` before resuming are not descended into.
   */
  async *walk(): AsyncGenerator<WalkStep> {
    const levels = new Map<string, WalkLevel>();
    const level = (rel: string): WalkLevel => {
      let l = levels.get(rel);
      if (!l) {
        l = { dirs: [], files: [] };
        levels.set(rel, l);
      }
      return l;
    };
    level("");
    for await (const entry of (await this.#adapter()).walk()) {
      const cut = entry.relative.lastIndexOf("/");
      const parent = level(cut === -1 ? "" : entry.relative.slice(0, cut));
      const name = entry.relative.slice(cut + 1);
      if (entry.isDir) {
        parent.dirs.push(name);
        level(entry.relative).ref = entry;
      } else {
        parent.files.push(name);
      }
    }
    yield* this.#walkFrom(levels, "", this);
  }

  *#walkFrom(levels: Map<string, WalkLevel>, rel: string, dir: KPath): Generator<WalkStep> {
    const l = levels.get(rel) ?? { dirs: [], files: [] };
    const dirs = [...l.dirs].sort();
    yield { dir, dirs, files: [...l.files].sort() };
    for (const name of dirs) {
      const sub = rel === "" ? name : `${rel}/${name}`;
      const ref = levels.get(sub)?.ref;
      if (ref) yield* this.#walkFrom(levels, sub, this.#child(ref));
    }
  }

  /** Descendants whose path relative to this one matches `pattern`. */
  async *glob(pattern: string): AsyncGenerator<KPath> {
    for await (const entry of (await this.#adapter()).walk()) {
      if (minimatch(entry.relative, pattern, { dot: true })) yield this.#child(entry);
    }
  }

  /** `glob` at any depth. */
  rglob(pattern: string): AsyncGenerator<KPath> {
    return this.glob(`**/${pattern}`);
  }

  /** Raw member table of an archive, in stored order. */
  async members(): Promise<ArchiveMember[]> {
    const adapter = await this.#adapter();
    if (!(adapter instanceof ArchiveAdapter)) {
      throw new KompressError("UnsupportedOperation", `not an archive: ${this.path}`, { path: this.path });
    }
    return adapter.members();
  }

  #child(ref: ChildRef): KPath {
    return this.#derive(ref.path, ref.member);
  }

  async #adapter(): Promise<CodecAdapter> {
    const codec = this.codec;
    this.#logger
      .Debug()
      .Str("path", this.path)
      .Str("member", this.member ?? "")
      .Str("codec", describeCodec(codec))
      .Msg("adapter");
    if (this.member !== undefined && codec.kind !== "archive") {
      throw new KompressError("UnsupportedOperation", `not an archive: ${this.path}`, {
        path: this.path,
        member: this.member,
      });
    }
    switch (codec.kind) {
      case "passthrough":
        return new PassthroughAdapter(this.path, this.#logger);
      case "decompress":
        return new DecompressAdapter(
          this.path,
          codec.engine,
          this.#opts.engines ?? (await defaultEngines()),
          this.#logger,
        );
      case "archive":
        return new ArchiveAdapter(
          this.path,
          codec.engine,
          {
            ...(this.member !== undefined ? { member: this.member } : {}),
            shortcutSingleMember: this.#config.shortcutSingleMember,
          },
          this.#logger,
        );
    }
  }
}

function nameOf(path: string): string {
  const parts = path.split(sep).filter((s) => s !== "");
  return parts[parts.length - 1] ?? "";
}

function serialisable(opts: KompressOptions): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (opts.encoding !== undefined) out.encoding = opts.encoding;
  if (opts.debug !== undefined) out.debug = opts.debug;
  if (opts.shortcutSingleMember !== undefined) out.shortcutSingleMember = opts.shortcutSingleMember;
  return out;
}

/** Whether `path` (or `member` inside the archive at `path`) exists. */
export function kexists(path: string | KPath, member?: string, opts?: KompressOptions): Promise<boolean> {
  return new KPath(path, member, opts).exists();
}
