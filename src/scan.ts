// src/scan.ts
import * as walk from "@nodelib/fs.walk";
import type { Entry } from "@nodelib/fs.walk";
import { stat as statAsync } from "node:fs/promises";
import path from "node:path";
import { PassThrough } from "node:stream";
import { WatchRootMissingError } from "./errors.js";
import { createIgnorer, type ExclusionRules } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { toRel } from "./path-rel.js";

export interface ScanHit {
  kind: "file";
  path: string; // relative to the watch root
  absPath: string;
  mtime: number; // mtimeMs
}

// A directory the walk could not list. Nothing beneath it was observed.
export interface UnreadableDir {
  kind: "unreadable-dir";
  path: string; // relative to the watch root; "" for the root itself
  error: string;
}

export type ScanItem = ScanHit | UnreadableDir;

export async function assertWatchRoot(root: string): Promise<string> {
  const absRoot = path.resolve(root);
  const st = await statAsync(absRoot).catch(() => null);
  if (!st?.isDirectory()) {
    throw new WatchRootMissingError(absRoot);
  }
  return absRoot;
}

/**
 * Walk every regular file under root. Excluded directories are pruned, so
 * nothing beneath them is read. Entries come out in traversal order, which is
 * stable for an unchanged tree because the walk runs one directory at a time.
 * A directory that cannot be listed is reported as an `unreadable-dir` item
 * so callers can tell "gone" from "not visible".
 */
export async function* scanTree(
  root: string,
  exclusions: ExclusionRules,
  { logger = new NullLogger() }: { logger?: Logger } = {},
): AsyncGenerator<ScanItem> {
  const absRoot = await assertWatchRoot(root);
  const ig = createIgnorer(exclusions);
  const unreadable: UnreadableDir[] = [];

  const walker = walk.walkStream(absRoot, {
    stats: true,
    followSymbolicLinks: false,
    concurrency: 1,
    // Do not descend into excluded directories
    deepFilter: (e) => {
      if (!e.dirent.isDirectory()) return true;
      return !ig.ignoresDir(toRel(e.path, absRoot));
    },
    // Only regular files that are not excluded by name or pattern
    entryFilter: (e) =>
      e.dirent.isFile() && !ig.ignoresFile(toRel(e.path, absRoot)),
    errorFilter: (err) => {
      logger.warn("skipping unreadable directory", {
        path: err.path,
        error: err.message,
      });
      if (err.path) {
        unreadable.push({
          kind: "unreadable-dir",
          path: toRel(path.resolve(err.path), absRoot),
          error: err.message,
        });
      }
      return true;
    },
  });

  // The walker's stream never emits 'close', so iterating it directly hangs
  // once it ends; read it through a plain object-mode stream instead.
  const entries = new PassThrough({ objectMode: true });
  walker.on("error", (err: Error) => entries.destroy(err));
  walker.pipe(entries);

  let drained = false;
  try {
    const stream: AsyncIterable<Entry> = entries;
    for await (const entry of stream) {
      yield* unreadable.splice(0);
      const st = entry.stats ?? (await statAsync(entry.path));
      yield {
        kind: "file",
        path: toRel(entry.path, absRoot),
        absPath: entry.path,
        mtime: st.mtimeMs,
      };
    }
    drained = true;
    yield* unreadable.splice(0);
  } finally {
    // consumer stopped early
    if (!drained) {
      walker.unpipe(entries);
      walker.destroy();
    }
  }
}
