// src/reconcile.ts
import path from "node:path";
import { FingerprintError } from "./errors.js";
import { createFingerprinter, type Fingerprinter } from "./hash.js";
import { NullLogger, type Logger } from "./logger.js";
import type { ScanItem } from "./scan.js";
import type { FileRecord, StateStore } from "./store.js";

export type ScanEntry = FileRecord;

export interface FileMove {
  oldPath: string;
  newPath: string;
  fingerprint: string;
}

export interface SkippedFile {
  path: string;
  error: string;
}

export interface ChangeSet {
  added: ScanEntry[];
  moved: FileMove[];
  deleted: string[];
}

export interface ReconcileResult extends ChangeSet {
  priorCount: number;
  scanned: number;
  hashed: number;
  skipped: SkippedFile[];
  unreadableDirs: SkippedFile[];
}

export interface Unobserved {
  paths?: ReadonlySet<string>; // files seen but not fingerprinted
  dirs?: readonly string[]; // directories that could not be listed
}

function isWithin(p: string, dir: string): boolean {
  return dir === "" || p === dir || p.startsWith(dir + path.sep);
}

export interface ReconcileOptions {
  fingerprint?: Fingerprinter;
  logger?: Logger;
}

/**
 * Classify the difference between the prior records and the current scan.
 *
 * Moves are matched through a fingerprint -> prior path index built from the
 * prior paths that disappeared. When several vanished paths share a
 * fingerprint the last one indexed wins, and each vanished path can be the
 * source of at most one move. A new path whose bytes match a file that is
 * still present is a copy, which counts as added.
 *
 * Unobserved paths (files that could not be read, anything beneath a
 * directory that could not be listed) are neither added, deleted nor used as
 * move sources.
 */
export function classifyChanges(
  prior: ReadonlyMap<string, FileRecord>,
  current: ReadonlyMap<string, ScanEntry>,
  { paths = new Set<string>(), dirs = [] }: Unobserved = {},
): ChangeSet {
  const present = (p: string) =>
    current.has(p) || paths.has(p) || dirs.some((d) => isWithin(p, d));

  const vanishedByFingerprint = new Map<string, string>();
  for (const [p, rec] of prior) {
    if (!present(p)) vanishedByFingerprint.set(rec.fingerprint, p);
  }

  const added: ScanEntry[] = [];
  const moved: FileMove[] = [];
  const consumed = new Set<string>();

  for (const entry of current.values()) {
    const before = prior.get(entry.path);
    if (before) {
      // same path, new bytes
      if (before.fingerprint !== entry.fingerprint) added.push(entry);
      continue;
    }
    const source = vanishedByFingerprint.get(entry.fingerprint);
    if (source !== undefined && !consumed.has(source)) {
      consumed.add(source);
      moved.push({
        oldPath: source,
        newPath: entry.path,
        fingerprint: entry.fingerprint,
      });
      continue;
    }
    added.push(entry);
  }

  const deleted: string[] = [];
  for (const p of prior.keys()) {
    if (!present(p) && !consumed.has(p)) deleted.push(p);
  }

  return { added, moved, deleted };
}

/**
 * One reconciliation pass: fingerprint what changed, classify, then record.
 * A file whose mtime matches its record keeps the recorded fingerprint and is
 * not read. A move renames the prior record in place.
 */
export async function reconcile(
  items: AsyncIterable<ScanItem> | Iterable<ScanItem>,
  store: StateStore,
  {
    fingerprint = createFingerprinter(),
    logger = new NullLogger(),
  }: ReconcileOptions = {},
): Promise<ReconcileResult> {
  const prior = store.loadAll();
  const current = new Map<string, ScanEntry>();
  const skipped: SkippedFile[] = [];
  const unreadableDirs: SkippedFile[] = [];
  let scanned = 0;
  let hashed = 0;

  for await (const item of items) {
    if (item.kind === "unreadable-dir") {
      unreadableDirs.push({ path: item.path, error: item.error });
      continue;
    }
    scanned += 1;
    const rec = prior.get(item.path);
    if (rec && rec.mtime === item.mtime) {
      current.set(item.path, rec);
      continue;
    }
    let digest: string;
    try {
      digest = await fingerprint(item.absPath);
    } catch (err) {
      if (!(err instanceof FingerprintError)) throw err;
      logger.warn("skipping file", { path: item.path, error: err.message });
      skipped.push({ path: item.path, error: err.message });
      continue;
    }
    hashed += 1;
    const entry = { path: item.path, fingerprint: digest, mtime: item.mtime };
    // known paths are refreshed now; new ones wait until moves are known
    if (rec) store.upsert(entry);
    current.set(item.path, entry);
  }

  const changes = classifyChanges(prior, current, {
    paths: new Set(skipped.map((s) => s.path)),
    dirs: unreadableDirs.map((d) => d.path),
  });

  for (const move of changes.moved) {
    store.rename(move.oldPath, move.newPath);
    const moved = current.get(move.newPath);
    if (moved && moved.mtime !== prior.get(move.oldPath)?.mtime) {
      store.upsert(moved);
    }
    logger.debug("moved", { from: move.oldPath, to: move.newPath });
  }
  for (const entry of changes.added) {
    if (!prior.has(entry.path)) store.upsert(entry);
  }
  for (const p of changes.deleted) {
    store.delete(p);
    logger.debug("deleted", { path: p });
  }

  return {
    ...changes,
    priorCount: prior.size,
    scanned,
    hashed,
    skipped,
    unreadableDirs,
  };
}
