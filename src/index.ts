export { KPath, kexists } from "./kpath.js";
export type { WalkStep } from "./kpath.js";
export { Ext, FORMATS, PASSTHROUGH, codecOf, resolveCodec, isCompressed, describeCodec } from "./formats.js";
export type { ArchiveEngine, CodecKind, DecompressEngine, FormatDescriptor, PathLike } from "./formats.js";
export { KompressError, isKompressError } from "./errors.js";
export type { KompressErrorCode } from "./errors.js";
export { KompressConfig, DEFAULT_CONFIG, resolveConfig, configFromEnv } from "./config.js";
export type { KompressOptions, ResolvedConfig } from "./config.js";
export { GzipDecode, XzDecode, ZstdDecode, Lz4Decode, defaultEngines, loadEngines } from "./engines.js";
export type { DecodeEngine, EngineSet } from "./engines.js";
export { decodeLz4Frames, decodeZstdFrames } from "./frames.js";
export type { FrameDecompress, FrameHashes } from "./frames.js";
export { PassthroughAdapter } from "./codecs/passthrough.js";
export { DecompressAdapter } from "./codecs/decompress.js";
export { ArchiveAdapter, archiveReader } from "./archive/resolver.js";
export { MemberTree } from "./archive/tree.js";
export type { ArchiveMember, MemberNode } from "./archive/tree.js";
export type { ArchiveReader } from "./archive/types.js";
export type { CodecAdapter, ChildRef, PathStat, WalkEntry } from "./codecs/types.js";
export { ensureLogger, LOGGER_MODULE } from "./logger.js";
