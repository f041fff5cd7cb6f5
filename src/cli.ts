#!/usr/bin/env node
// kompress CLI — read compressed files and archives from the command line.
//
//   kompress cat logs/app.log.xz
//   kompress cat bundle.zip --member docs/readme.txt
//   kompress cat data.bin.zst --binary > data.bin
//   kompress ls bundle.tar.gz
//   kompress stat bundle.zip --member docs
//   kompress detect a.txt b.tar.gz c.zst
//
// Errors are printed as `<code>: <message>` on stderr with exit code 1.

import { command, subcommands, run, string, option, optional, flag, positional, restPositionals } from "cmd-ts";
import { KPath } from "./kpath.js";
import { isKompressError } from "./errors.js";
import { describeCodec, resolveCodec } from "./formats.js";

const pathArg = positional({ type: string, displayName: "path", description: "File, compressed file or archive" });
const memberOpt = option({
  type: optional(string),
  long: "member",
  short: "m",
  description: "Member path inside an archive",
});

function target(path: string, member: string | undefined): KPath {
  return new KPath(path, member);
}

async function guarded(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (!isKompressError(err)) throw err;
    console.error(`${err.code}: ${err.message}`);
    process.exit(1);
  }
}

async function writeOut(stream: ReadableStream<Uint8Array | string>): Promise<void> {
  const reader = stream.getReader();
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    await new Promise<void>((resolve, reject) => {
      process.stdout.write(value, (err) => (err ? reject(err) : resolve()));
    });
  }
}

// ── cat ───────────────────────────────────────────────────────────────────────

const catCmd = command({
  name: "cat",
  description: "Print decoded content",
  args: {
    path: pathArg,
    member: memberOpt,
    encoding: option({
      type: optional(string),
      long: "encoding",
      short: "e",
      description: "Text encoding (default: utf-8 or KOMPRESS_ENCODING)",
    }),
    binary: flag({ long: "binary", short: "b", description: "Write raw decoded bytes" }),
  },
  handler: ({ path, member, encoding, binary }): Promise<void> =>
    guarded(async () => {
      const p = target(path, member);
      await writeOut(binary ? await p.openBinary() : await p.openText(encoding));
    }),
});

// ── ls ────────────────────────────────────────────────────────────────────────

const lsCmd = command({
  name: "ls",
  description: "List a directory or archive",
  args: { path: pathArg, member: memberOpt },
  handler: ({ path, member }): Promise<void> =>
    guarded(async () => {
      for await (const child of target(path, member).iterdir()) {
        const suffix = (await child.isDir()) ? "/" : "";
        console.log(`${child.toString()}${suffix}`);
      }
    }),
});

// ── stat ──────────────────────────────────────────────────────────────────────

const statCmd = command({
  name: "stat",
  description: "Print existence, kind and size as JSON",
  args: { path: pathArg, member: memberOpt },
  handler: ({ path, member }): Promise<void> =>
    guarded(async () => {
      const p = target(path, member);
      const st = await p.stat();
      console.log(JSON.stringify({ path: p.toString(), codec: describeCodec(p.codec), ...st }, null, 2));
    }),
});

// ── detect ────────────────────────────────────────────────────────────────────

const detectCmd = command({
  name: "detect",
  description: "Print the codec each path resolves to",
  args: {
    paths: restPositionals({ type: string, displayName: "paths", description: "Paths to classify" }),
  },
  handler: ({ paths }): void => {
    for (const p of paths) {
      console.log(`${describeCodec(resolveCodec(p))}\t${p}`);
    }
  },
});

// ── main ──────────────────────────────────────────────────────────────────────

const app = subcommands({
  name: "kompress",
  description: "kompress CLI — read through compression and archives",
  cmds: { cat: catCmd, ls: lsCmd, stat: statCmd, detect: detectCmd },
});

void run(app, process.argv.slice(2));
