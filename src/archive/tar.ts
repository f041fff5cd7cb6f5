// Gzip-compressed tar reader: fflate inflates the whole file, tar-stream walks
// the headers. Only regular files and directories become members; links and
// special entries are skipped.

import { gunzipSync } from "fflate";
import { extract, type Headers } from "tar-stream";
import { KompressError, toCorruptData } from "../errors.js";
import { concatChunks, readFileBytes } from "../streams.js";
import { toArchiveMember, type ArchiveMember } from "./tree.js";
import type { ArchiveReader } from "./types.js";

function isListed(header: Headers): boolean {
  return header.type === "file" || header.type === "contiguous-file" || header.type === "directory";
}

/**
 * Runs `tar` through tar-stream's extractor. `onEntry` sees every listed
 * header; bodies are collected only for entries where `keep` is true.
 */
function scanTar(
  tar: Uint8Array,
  keep: (header: Headers) => boolean,
  onEntry: (header: Headers, body?: Uint8Array) => void,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const ex = extract();
    ex.on("entry", (header, stream, next) => {
      const wanted = isListed(header) && keep(header);
      const chunks: Uint8Array[] = [];
      stream.on("data", (chunk: Uint8Array) => {
        if (wanted) chunks.push(chunk);
      });
      stream.on("end", () => {
        if (isListed(header)) onEntry(header, wanted ? concatChunks(chunks) : undefined);
        next();
      });
      stream.on("error", reject);
    });
    ex.on("finish", resolve);
    ex.on("error", reject);
    ex.end(Buffer.from(tar.buffer, tar.byteOffset, tar.byteLength));
  });
}

export class TarGzArchive implements ArchiveReader {
  readonly #path: string;

  constructor(path: string) {
    this.#path = path;
  }

  async list(): Promise<ArchiveMember[]> {
    const tar = await this.#inflate();
    const members: ArchiveMember[] = [];
    await this.#scan(
      tar,
      () => false,
      (h) => {
        const m = toArchiveMember(h.name, h.size ?? 0, h.mtime, h.type === "directory" || h.name.endsWith("/"));
        if (m) members.push(m);
      },
    );
    return members;
  }

  async read(member: ArchiveMember): Promise<Uint8Array> {
    const tar = await this.#inflate();
    let found: Uint8Array | undefined;
    // Keep the last copy of a name, as extraction would.
    await this.#scan(
      tar,
      (h) => h.name === member.rawName,
      (_h, body) => {
        if (body) found = body;
      },
      member.path,
    );
    if (!found) {
      throw new KompressError("NotFound", `no member ${member.path} in ${this.#path}`, {
        path: this.#path,
        member: member.path,
      });
    }
    return found;
  }

  async #inflate(): Promise<Uint8Array> {
    const gz = await readFileBytes(this.#path);
    try {
      return gunzipSync(gz);
    } catch (err) {
      throw toCorruptData(err, { path: this.#path, engine: "tar+gzip" });
    }
  }

  async #scan(
    tar: Uint8Array,
    keep: (header: Headers) => boolean,
    onEntry: (header: Headers, body?: Uint8Array) => void,
    member?: string,
  ): Promise<void> {
    try {
      await scanTar(tar, keep, onEntry);
    } catch (err) {
      throw toCorruptData(err, { path: this.#path, ...(member ? { member } : {}), engine: "tar+gzip" });
    }
  }
}
