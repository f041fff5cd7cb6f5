// Member tree — turns an archive's flat member table into directory nodes.
//
// Archives list members as flat names ("a/", "a/b.txt", "./c"); directory
// entries are optional and may appear after their contents. Names are
// normalised (leading "./" and "/" dropped, "." root entries skipped) and any
// parent without an entry of its own is synthesised. Children keep the order
// in which they first appear in the archive index.

export interface ArchiveMember {
  /** Name exactly as stored in the archive index. */
  rawName: string;
  /** Normalised `/`-separated path, without leading "./" or trailing "/". */
  path: string;
  isDir: boolean;
  /** Uncompressed size in bytes as recorded by the index. */
  size: number;
  mtime?: Date;
}

export interface MemberNode {
  /** Normalised path; "" for the archive root. */
  path: string;
  name: string;
  isDir: boolean;
  /** The index entry backing this node; absent for synthesised directories. */
  member?: ArchiveMember;
  children: MemberNode[];
}

/** Splits a stored or requested name into clean path segments. */
export function memberSegments(name: string): string[] {
  return name.split("/").filter((s) => s !== "" && s !== ".");
}

export function normaliseMemberPath(name: string): string {
  return memberSegments(name).join("/");
}

/** Normalises a stored name; undefined for the root entry ("." or "./"). */
export function toArchiveMember(rawName: string, size: number, mtime?: Date, isDir = rawName.endsWith("/")): ArchiveMember | undefined {
  const path = normaliseMemberPath(rawName);
  if (path === "") return undefined;
  return { rawName, path, isDir, size, ...(mtime ? { mtime } : {}) };
}

/** Depth-first, pre-order walk below `from` (exclusive). */
export function* walkNodes(from: MemberNode): Generator<MemberNode> {
  for (const child of from.children) {
    yield child;
    yield* walkNodes(child);
  }
}

export class MemberTree {
  readonly root: MemberNode = { path: "", name: "", isDir: true, children: [] };
  readonly #nodes = new Map<string, MemberNode>([["", this.root]]);

  static build(members: Iterable<ArchiveMember>): MemberTree {
    const tree = new MemberTree();
    for (const m of members) tree.#add(m);
    return tree;
  }

  get(path: string): MemberNode | undefined {
    return this.#nodes.get(normaliseMemberPath(path));
  }

  walk(): Generator<MemberNode> {
    return walkNodes(this.root);
  }

  #add(member: ArchiveMember): void {
    const node = this.#ensure(member.path);
    // Later entries for the same name replace earlier ones, as extraction would.
    node.member = member;
    node.isDir = node.isDir || member.isDir;
  }

  #ensure(path: string): MemberNode {
    const existing = this.#nodes.get(path);
    if (existing) return existing;
    const cut = path.lastIndexOf("/");
    const parent = this.#ensure(cut === -1 ? "" : path.slice(0, cut));
    parent.isDir = true;
    const node: MemberNode = { path, name: path.slice(cut + 1), isDir: false, children: [] };
    parent.children.push(node);
    this.#nodes.set(path, node);
    return node;
  }
}
