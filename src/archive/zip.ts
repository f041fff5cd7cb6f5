// Zip reader over fflate. The whole archive is read per call; listing walks
// the central directory without inflating anything. fflate's listing carries
// no timestamps, so modification times are read from the central directory
// records directly.

import { FlateErrorCode, unzipSync } from "fflate";
import { KompressError, toCorruptData } from "../errors.js";
import { readFileBytes } from "../streams.js";
import { toArchiveMember, type ArchiveMember } from "./tree.js";
import type { ArchiveReader } from "./types.js";

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_SIZE = 22;
const CDFH_SIGNATURE = 0x02014b50;
const CDFH_SIZE = 46;

/** DOS date and time fields, read as local time like the zip writer stored them. */
export function dosToDate(time: number, date: number): Date | undefined {
  if (date === 0) return undefined;
  return new Date(
    ((date >> 9) & 0x7f) + 1980,
    ((date >> 5) & 0x0f) - 1,
    date & 0x1f,
    (time >> 11) & 0x1f,
    (time >> 5) & 0x3f,
    (time & 0x1f) * 2,
  );
}

function decodeName(bytes: Uint8Array, utf8: boolean): string {
  return utf8 ? new TextDecoder().decode(bytes) : String.fromCharCode(...bytes);
}

/** Modification times by stored name; empty when the directory cannot be located. */
export function centralDirectoryTimes(data: Uint8Array): Map<string, Date> {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const times = new Map<string, Date>();
  let eocd = -1;
  // The record is followed by a comment of at most 0xffff bytes.
  for (let i = data.length - EOCD_SIZE; i >= 0 && i >= data.length - EOCD_SIZE - 0xffff; i--) {
    if (view.getUint32(i, true) === EOCD_SIGNATURE) {
      eocd = i;
      break;
    }
  }
  if (eocd < 0) return times;
  const entries = view.getUint16(eocd + 10, true);
  let at = view.getUint32(eocd + 16, true);
  for (let n = 0; n < entries && at + CDFH_SIZE <= data.length; n++) {
    if (view.getUint32(at, true) !== CDFH_SIGNATURE) break;
    const nameEnd = at + CDFH_SIZE + view.getUint16(at + 28, true);
    if (nameEnd > data.length) break;
    const name = decodeName(data.subarray(at + CDFH_SIZE, nameEnd), (view.getUint16(at + 8, true) & 0x800) !== 0);
    const mtime = dosToDate(view.getUint16(at + 12, true), view.getUint16(at + 14, true));
    if (mtime) times.set(name, mtime);
    at = nameEnd + view.getUint16(at + 30, true) + view.getUint16(at + 32, true);
  }
  return times;
}

function isUnknownMethod(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === FlateErrorCode.UnknownCompressionMethod;
}

export class ZipArchive implements ArchiveReader {
  readonly #path: string;

  constructor(path: string) {
    this.#path = path;
  }

  async list(): Promise<ArchiveMember[]> {
    const data = await readFileBytes(this.#path);
    const members: ArchiveMember[] = [];
    const times = centralDirectoryTimes(data);
    this.#guard(undefined, () =>
      unzipSync(data, {
        filter: (f) => {
          const m = toArchiveMember(f.name, f.originalSize, times.get(f.name));
          if (m) members.push(m);
          return false;
        },
      }),
    );
    return members;
  }

  async read(member: ArchiveMember): Promise<Uint8Array> {
    const data = await readFileBytes(this.#path);
    const out = this.#guard(member.path, () => unzipSync(data, { filter: (f) => f.name === member.rawName }));
    const bytes = out[member.rawName];
    if (!bytes) {
      throw new KompressError("NotFound", `no member ${member.path} in ${this.#path}`, {
        path: this.#path,
        member: member.path,
      });
    }
    return bytes;
  }

  #guard<T>(member: string | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isUnknownMethod(err)) {
        throw new KompressError("UnsupportedFormat", `zip: unsupported compression method in ${this.#path}`, {
          path: this.#path,
          ...(member ? { member } : {}),
          cause: err,
        });
      }
      throw toCorruptData(err, { path: this.#path, ...(member ? { member } : {}), engine: "zip" });
    }
  }
}
