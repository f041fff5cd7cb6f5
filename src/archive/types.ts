import type { ArchiveMember } from "./tree.js";

/** Format-specific access to an archive's member table and member bytes. */
export interface ArchiveReader {
  /** Every member in index order, names normalised. */
  list(): Promise<ArchiveMember[]>;
  /** Whole decoded content of a file member. */
  read(member: ArchiveMember): Promise<Uint8Array>;
}
