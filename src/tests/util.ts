import fsp from "node:fs/promises";
import os from "node:os";
import { dirname, join } from "node:path";
import { FingerprintError } from "../errors.js";
import type { Fingerprinter } from "../hash.js";
import { StructuredLogger, type LogEntry } from "../logger.js";
import type { ScanHit } from "../scan.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), prefix));
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

/** Write root/rel (creating parents); optionally pin its mtime (seconds). */
export async function writeAt(
  root: string,
  rel: string,
  content: string | Buffer,
  mtimeSec?: number,
): Promise<string> {
  const abs = join(root, rel);
  await fsp.mkdir(dirname(abs), { recursive: true });
  await fsp.writeFile(abs, content);
  if (mtimeSec != null) {
    await fsp.utimes(abs, mtimeSec, mtimeSec);
  }
  return abs;
}

export async function collect<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const v of it) out.push(v);
  return out;
}

export function captureLogs(): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ sink: (e) => entries.push(e) });
  return { logger, entries };
}

// An in-memory file tree: relative path -> content fingerprint and mtime.
// A fingerprint of null makes the file unreadable.
export type FakeTree = Record<string, { fp: string | null; mtime: number }>;

export const FAKE_ROOT = "/virtual";

export function hitsFor(tree: FakeTree): ScanHit[] {
  return Object.entries(tree).map(([path, { mtime }]): ScanHit => ({
    kind: "file",
    path,
    absPath: `${FAKE_ROOT}/${path}`,
    mtime,
  }));
}

export function fakeFingerprinter(tree: FakeTree): jest.MockedFunction<Fingerprinter> {
  return jest.fn(async (absPath: string) => {
    const rel = absPath.slice(FAKE_ROOT.length + 1);
    const fp = tree[rel]?.fp;
    if (fp == null) {
      throw new FingerprintError(absPath, new Error("EACCES: permission denied"));
    }
    return fp;
  });
}

// Deterministic PRNG (mulberry32) so randomized sequences replay exactly.
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
