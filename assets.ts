// assets.ts
//
// Fingerprints for files the caller names explicitly (checkpoints, datasets,
// configs). One bad path never spoils the batch: its entry becomes the error
// text instead of a record.

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as readline from "node:readline";

import { errorText } from "./errors.js";

export type AssetRecord = {
  size: number;
  atime: string;
  mtime: string;
  ctime: string;
  md5: string;
  peek?: unknown;
};

/** Format-specific summary of a file. Allowed to throw. */
export type Peeker = (filePath: string) => Promise<unknown>;

/** Peekers keyed by lowercase extension, dot included (".json"). */
export type PeekerMap = Readonly<Record<string, Peeker>>;

export type AssetOptions = {
  peekers?: PeekerMap;
  chunkSize?: number; // default 1 MiB
  timeoutMs?: number; // per file read, default 10 minutes
  maxPeekBytes?: number; // larger files get no peek, default 64 MiB
};

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;
export const DEFAULT_MAX_PEEK_BYTES = 64 * 1024 * 1024;

/**
 * MD5 of a file's bytes, read in fixed-size chunks. Integrity fingerprint
 * only; the digest does not depend on the chunk size.
 */
export async function fingerprintFile(
  filePath: string,
  opts: { chunkSize?: number; timeoutMs?: number } = {}
): Promise<string> {
  const hash = createHash("md5");
  const stream = createReadStream(filePath, {
    highWaterMark: opts.chunkSize ?? DEFAULT_CHUNK_SIZE,
    signal: AbortSignal.timeout(opts.timeoutMs ?? 600_000),
  });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

async function peekJson(filePath: string): Promise<unknown> {
  const data: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
  if (Array.isArray(data)) return { type: "array", length: data.length };
  if (typeof data === "object" && data !== null) return { type: "object", keys: Object.keys(data).sort() };
  return { type: typeof data };
}

async function peekJsonLines(filePath: string): Promise<unknown> {
  const rl = readline.createInterface({ input: createReadStream(filePath), crlfDelay: Infinity });
  let records = 0;
  for await (const line of rl) {
    if (line.trim()) records++;
  }
  return { records };
}

export const DEFAULT_PEEKERS: PeekerMap = {
  ".json": peekJson,
  ".jsonl": peekJsonLines,
  ".ndjson": peekJsonLines,
};

async function peekAsset(filePath: string, peekers: PeekerMap): Promise<unknown> {
  const peeker = peekers[path.extname(filePath).toLowerCase()];
  if (!peeker) return undefined;
  try {
    return await peeker(filePath);
  } catch {
    // peek is optional
    return undefined;
  }
}

export async function assetInfo(filePath: string, opts: AssetOptions = {}): Promise<AssetRecord | string> {
  let record: AssetRecord;
  try {
    const st = await fs.stat(filePath);
    const md5 = await fingerprintFile(filePath, opts);
    record = {
      size: st.size,
      atime: st.atime.toISOString(),
      mtime: st.mtime.toISOString(),
      ctime: st.ctime.toISOString(),
      md5,
    };
  } catch (e) {
    return errorText(e);
  }

  // peekers may load the whole file
  if (record.size > (opts.maxPeekBytes ?? DEFAULT_MAX_PEEK_BYTES)) return record;

  const peek = await peekAsset(filePath, opts.peekers ?? DEFAULT_PEEKERS);
  if (peek !== undefined) record.peek = peek;
  return record;
}

/** Fingerprint each path in turn, one file open at a time. */
export async function assetsInfo(paths: Iterable<string>, opts: AssetOptions = {}): Promise<Record<string, AssetRecord | string>> {
  const result: Record<string, AssetRecord | string> = {};
  for (const p of paths) {
    result[p] = await assetInfo(p, opts);
  }
  return result;
}
