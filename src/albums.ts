// src/albums.ts
import path from "node:path";
import { ALBUM_DELIMITER, UNASSIGNED_GROUP_ID } from "./constants.js";
import type { StateStore } from "./store.js";

// "2024/Trip/1.jpg" -> "2024 - Trip"; files at the root land in "."
export function deriveAlbumKey(relPath: string): string {
  return path
    .normalize(path.dirname(relPath))
    .split(path.sep)
    .join(ALBUM_DELIMITER);
}

export function albumKeysFor(paths: Iterable<string>): Set<string> {
  const keys = new Set<string>();
  for (const p of paths) keys.add(deriveAlbumKey(p));
  return keys;
}

export interface AlbumChangeSummary {
  created: string[];
  removed: string[];
}

/**
 * Bring the album table in line with the files table: every album key
 * derivable from a recorded file exists, and no other key does. New keys are
 * linked to groupId (the unassigned group unless told otherwise).
 */
export function reconcileAlbums(
  store: StateStore,
  { groupId = UNASSIGNED_GROUP_ID }: { groupId?: number } = {},
): AlbumChangeSummary {
  const derived = albumKeysFor(store.listPaths());
  const persisted = new Set(store.listAlbumKeys());
  const created = [...derived].filter((k) => !persisted.has(k)).sort();
  const removed = [...persisted].filter((k) => !derived.has(k)).sort();
  if (created.length || removed.length) {
    store.applyAlbumChanges({ create: created, remove: removed, groupId });
  }
  return { created, removed };
}

export function countNewByAlbum(
  added: Iterable<{ path: string }>,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const { path: p } of added) {
    const key = deriveAlbumKey(p);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
