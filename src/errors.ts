// Typed failures surfaced by every kompress operation.
//
// Codec dispatch never fails; errors only appear once bytes are requested:
//
//   NotFound              — file or archive member absent
//   CorruptData           — a decompression/extraction engine rejected the bytes
//   UnsupportedFormat     — recognised name, but the engine is not installed
//                           (or the archive uses a member codec the engine lacks)
//   UnsupportedOperation  — e.g. iterdir() on a file, openBinary() on a directory

export type KompressErrorCode = "NotFound" | "CorruptData" | "UnsupportedFormat" | "UnsupportedOperation";

export class KompressError extends Error {
  readonly code: KompressErrorCode;
  /** Filesystem path involved in the failure (the archive path for compound references). */
  readonly path?: string;
  /** Inner archive member, when the failure concerns one. */
  readonly member?: string;
  override readonly cause?: unknown;

  constructor(
    code: KompressErrorCode,
    message: string,
    opts?: { path?: string; member?: string; cause?: unknown },
  ) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "KompressError";
    this.code = code;
    if (opts?.path !== undefined) this.path = opts.path;
    if (opts?.member !== undefined) this.member = opts.member;
    if (opts?.cause !== undefined) this.cause = opts.cause;
  }

  toJSON(): { name: string; code: KompressErrorCode; message: string; path?: string; member?: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.path !== undefined ? { path: this.path } : {}),
      ...(this.member !== undefined ? { member: this.member } : {}),
    };
  }
}

export function isKompressError(err: unknown, code?: KompressErrorCode): err is KompressError {
  return err instanceof KompressError && (code === undefined || err.code === code);
}

// ── Node system errors ────────────────────────────────────────────────────────

interface SystemError extends Error {
  code: string;
  syscall: string;
}

/** Errors raised by the OS through node:fs carry `syscall`; engine errors don't. */
export function isSystemError(err: unknown): err is SystemError {
  return (
    err instanceof Error &&
    "syscall" in err &&
    typeof err.syscall === "string" &&
    "code" in err &&
    typeof err.code === "string"
  );
}

/**
 * Maps a failed filesystem call onto the kompress error surface.
 * Anything without a kompress counterpart is returned unchanged.
 */
export function fromFsError(err: unknown, path: string): unknown {
  if (!isSystemError(err)) return err;
  switch (err.code) {
    case "ENOENT":
    case "ENOTDIR":
      return new KompressError("NotFound", `no such file: ${path}`, { path, cause: err });
    case "EISDIR":
      return new KompressError("UnsupportedOperation", `is a directory: ${path}`, { path, cause: err });
    default:
      return err;
  }
}

/**
 * Wraps an engine failure as CorruptData. Errors that are already typed, and
 * OS-level I/O errors, pass through.
 */
export function toCorruptData(err: unknown, opts: { path: string; member?: string; engine: string }): unknown {
  if (err instanceof KompressError || isSystemError(err)) return err;
  const detail = err instanceof Error ? err.message : String(err);
  const where = opts.member !== undefined ? `${opts.path}:${opts.member}` : opts.path;
  return new KompressError("CorruptData", `${opts.engine}: cannot decode ${where}: ${detail}`, {
    path: opts.path,
    ...(opts.member !== undefined ? { member: opts.member } : {}),
    cause: err,
  });
}
