// Archive adapter — resolves a member reference against an archive's tree.
//
// Without a member, an archive holding exactly one top-level file behaves as
// that file (when shortcutSingleMember is on); any other archive behaves as a
// directory whose children are its top-level members. Listings are re-derived
// on every call.

import type { Logger } from "@adviser/cement";
import { uint8array2stream } from "@adviser/cement/utils";
import { KompressError, isKompressError } from "../errors.js";
import type { ArchiveEngine } from "../formats.js";
import { BaseAdapter, MISSING, type ChildRef, type PathStat, type WalkEntry } from "../codecs/types.js";
import { TarGzArchive } from "./tar.js";
import { MemberTree, normaliseMemberPath, walkNodes, type ArchiveMember, type MemberNode } from "./tree.js";
import type { ArchiveReader } from "./types.js";
import { ZipArchive } from "./zip.js";

type Target =
  | { kind: "missing" }
  | { kind: "file"; node: MemberNode; member: ArchiveMember }
  | { kind: "dir"; node: MemberNode };

export function archiveReader(path: string, engine: ArchiveEngine): ArchiveReader {
  switch (engine) {
    case "zip":
      return new ZipArchive(path);
    case "tar+gzip":
      return new TarGzArchive(path);
  }
}

export interface ArchiveAdapterOptions {
  member?: string;
  shortcutSingleMember: boolean;
}

export class ArchiveAdapter extends BaseAdapter {
  readonly #path: string;
  readonly #engine: ArchiveEngine;
  readonly #member?: string;
  readonly #shortcut: boolean;
  readonly #reader: ArchiveReader;

  constructor(path: string, engine: ArchiveEngine, opts: ArchiveAdapterOptions, logger: Logger) {
    super(logger);
    this.#path = path;
    this.#engine = engine;
    if (opts.member !== undefined) this.#member = normaliseMemberPath(opts.member);
    this.#shortcut = opts.shortcutSingleMember;
    this.#reader = archiveReader(path, engine);
  }

  /** Every member of the archive, in index order. */
  members(): Promise<ArchiveMember[]> {
    return this.#reader.list();
  }

  async openBinary(): Promise<ReadableStream<Uint8Array>> {
    const target = await this.#resolve();
    switch (target.kind) {
      case "missing":
        throw this.#notFound();
      case "dir":
        throw this.#unsupported("cannot open a directory", target.node);
      case "file": {
        this.logger
          .Debug()
          .Str("path", this.#path)
          .Str("member", target.member.path)
          .Str("engine", this.#engine)
          .Msg("open member");
        return uint8array2stream(await this.#reader.read(target.member));
      }
    }
  }

  async stat(): Promise<PathStat> {
    let target: Target;
    try {
      target = await this.#resolve();
    } catch (err) {
      if (isKompressError(err, "NotFound")) return MISSING;
      throw err;
    }
    switch (target.kind) {
      case "missing":
        return MISSING;
      case "dir":
        return { exists: true, isFile: false, isDir: true, ...mtimeOf(target.node.member) };
      case "file":
        return { exists: true, isFile: true, isDir: false, size: target.member.size, ...mtimeOf(target.member) };
    }
  }

  async *iterdir(): AsyncGenerator<ChildRef> {
    const dir = await this.#directory();
    for (const child of dir.children) {
      yield { path: this.#path, member: child.path };
    }
  }

  async *walk(): AsyncGenerator<WalkEntry> {
    const dir = await this.#directory();
    const prefix = dir.path === "" ? "" : `${dir.path}/`;
    for (const node of walkNodes(dir)) {
      yield { path: this.#path, member: node.path, relative: node.path.slice(prefix.length), isDir: node.isDir };
    }
  }

  async #directory(): Promise<MemberNode> {
    const target = await this.#resolve();
    switch (target.kind) {
      case "missing":
        throw this.#notFound();
      case "file":
        throw this.#unsupported("not a directory", target.node);
      case "dir":
        return target.node;
    }
  }

  async #resolve(): Promise<Target> {
    const members = await this.#reader.list();
    this.logger.Debug().Str("path", this.#path).Str("engine", this.#engine).Any("members", members.length).Msg("listed");
    const tree = MemberTree.build(members);
    if (this.#member === undefined || this.#member === "") {
      const top = tree.root.children;
      const sole = top.length === 1 ? top[0] : undefined;
      if (this.#member === undefined && this.#shortcut && sole?.member && !sole.isDir) {
        return { kind: "file", node: sole, member: sole.member };
      }
      return { kind: "dir", node: tree.root };
    }
    const node = tree.get(this.#member);
    if (!node) return { kind: "missing" };
    if (node.isDir || !node.member) return { kind: "dir", node };
    return { kind: "file", node, member: node.member };
  }

  #notFound(): KompressError {
    const what = this.#member ? `no member ${this.#member} in ${this.#path}` : `no such archive: ${this.#path}`;
    return new KompressError("NotFound", what, {
      path: this.#path,
      ...(this.#member ? { member: this.#member } : {}),
    });
  }

  #unsupported(message: string, node: MemberNode): KompressError {
    const where = node.path === "" ? this.#path : `${this.#path}:${node.path}`;
    return new KompressError("UnsupportedOperation", `${message}: ${where}`, {
      path: this.#path,
      ...(node.path !== "" ? { member: node.path } : {}),
    });
  }
}

function mtimeOf(member?: ArchiveMember): { mtime?: Date } {
  return member?.mtime ? { mtime: member.mtime } : {};
}
