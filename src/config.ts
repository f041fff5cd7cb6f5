// Configuration — arktype schema for the serialisable options, merged as
//
//   defaults  ←  environment (KOMPRESS_ENCODING, KOMPRESS_DEBUG)  ←  explicit options
//
// Live objects (logger, engine set) travel next to the schema in KompressOptions.

import { type } from "arktype";
import type { Logger } from "@adviser/cement";
import type { EngineSet } from "./engines.js";
import type { CodecKind } from "./formats.js";

export const KompressConfig = type({
  "encoding?": "string",
  "debug?": "boolean",
  // Read a single-file archive directly from its own path.
  "shortcutSingleMember?": "boolean",
});
export type KompressConfig = typeof KompressConfig.infer;

export interface ResolvedConfig {
  encoding: string;
  debug: boolean;
  shortcutSingleMember: boolean;
}

export type KompressOptions = KompressConfig & {
  logger?: Logger;
  /** Decoder capabilities; defaults to whatever engines are installed. */
  engines?: EngineSet;
  /** Skips name-based detection for this path; not inherited by children. */
  codec?: CodecKind;
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  encoding: "utf-8",
  debug: false,
  shortcutSingleMember: true,
};

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return !["0", "false", "no", "off"].includes(value.toLowerCase());
}

export function configFromEnv(env: Record<string, string | undefined>): KompressConfig {
  const out: KompressConfig = {};
  if (env.KOMPRESS_ENCODING) out.encoding = env.KOMPRESS_ENCODING;
  const debug = envFlag(env.KOMPRESS_DEBUG);
  if (debug !== undefined) out.debug = debug;
  return out;
}

export function resolveConfig(input: unknown = {}, env: Record<string, string | undefined> = process.env): ResolvedConfig {
  const parsed = KompressConfig(input);
  if (parsed instanceof type.errors) {
    throw new Error(`invalid kompress config: ${parsed.summary}`);
  }
  return { ...DEFAULT_CONFIG, ...configFromEnv(env), ...stripUndefined(parsed) };
}

function stripUndefined(cfg: KompressConfig): KompressConfig {
  const out: KompressConfig = {};
  if (cfg.encoding !== undefined) out.encoding = cfg.encoding;
  if (cfg.debug !== undefined) out.debug = cfg.debug;
  if (cfg.shortcutSingleMember !== undefined) out.shortcutSingleMember = cfg.shortcutSingleMember;
  return out;
}
