// src/store.ts
import type BetterSqlite3 from "better-sqlite3";
import type { Database } from "./db.js";
import { StoreError } from "./errors.js";

export interface FileRecord {
  path: string;
  fingerprint: string;
  mtime: number;
}

export interface AlbumChanges {
  create: string[];
  remove: string[];
  groupId: number;
}

/**
 * Persistence for file and album records. Every mutation is its own
 * transaction; a failure rolls back and surfaces as StoreError.
 */
export interface StateStore {
  get(path: string): FileRecord | undefined;
  loadAll(): Map<string, FileRecord>;
  listPaths(): string[];
  upsert(record: FileRecord): void;
  rename(oldPath: string, newPath: string): void;
  delete(path: string): void;
  listAlbumKeys(): string[];
  applyAlbumChanges(changes: AlbumChanges): void;
}

type Statement<P extends unknown[], R = unknown> = BetterSqlite3.Statement<
  P,
  R
>;

export class SqliteStateStore implements StateStore {
  private readonly getStmt: Statement<[string], FileRecord>;
  private readonly allStmt: Statement<[], FileRecord>;
  private readonly pathsStmt: Statement<[], { path: string }>;
  private readonly upsertStmt: Statement<[string, string, number]>;
  private readonly existsStmt: Statement<[string], { path: string }>;
  private readonly renameStmt: Statement<[string, string]>;
  private readonly deleteStmt: Statement<[string]>;
  private readonly albumKeysStmt: Statement<[], { name: string }>;
  private readonly insertAlbumStmt: Statement<[string, number]>;
  private readonly deleteAlbumStmt: Statement<[string]>;

  constructor(private readonly db: Database) {
    this.getStmt = db.prepare<[string], FileRecord>(
      `SELECT path, fingerprint, mtime FROM files WHERE path = ?`,
    );
    this.allStmt = db.prepare<[], FileRecord>(
      `SELECT path, fingerprint, mtime FROM files`,
    );
    this.pathsStmt = db.prepare<[], { path: string }>(
      `SELECT path FROM files ORDER BY path`,
    );
    this.upsertStmt = db.prepare<[string, string, number]>(
      `INSERT INTO files(path, fingerprint, mtime) VALUES(?, ?, ?)
         ON CONFLICT(path) DO UPDATE SET
           fingerprint = excluded.fingerprint,
           mtime = excluded.mtime`,
    );
    this.existsStmt = db.prepare<[string], { path: string }>(
      `SELECT path FROM files WHERE path = ?`,
    );
    this.renameStmt = db.prepare<[string, string]>(
      `UPDATE files SET path = ? WHERE path = ?`,
    );
    this.deleteStmt = db.prepare<[string]>(`DELETE FROM files WHERE path = ?`);
    this.albumKeysStmt = db.prepare<[], { name: string }>(
      `SELECT DISTINCT name FROM albums ORDER BY name`,
    );
    this.insertAlbumStmt = db.prepare<[string, number]>(
      `INSERT OR IGNORE INTO albums(name, group_id) VALUES(?, ?)`,
    );
    this.deleteAlbumStmt = db.prepare<[string]>(
      `DELETE FROM albums WHERE name = ?`,
    );
  }

  get(path: string): FileRecord | undefined {
    return this.guard("get", () => this.getStmt.get(path));
  }

  loadAll(): Map<string, FileRecord> {
    return this.guard("load", () => {
      const out = new Map<string, FileRecord>();
      for (const row of this.allStmt.iterate()) {
        out.set(row.path, row);
      }
      return out;
    });
  }

  listPaths(): string[] {
    return this.guard("list", () =>
      this.pathsStmt.all().map((row) => row.path),
    );
  }

  upsert({ path, fingerprint, mtime }: FileRecord): void {
    this.write("upsert", () => {
      this.upsertStmt.run(path, fingerprint, mtime);
    });
  }

  // Updates the record's path in place. Should the destination already be
  // recorded, that row is kept and the source row dropped.
  rename(oldPath: string, newPath: string): void {
    this.write("rename", () => {
      if (this.existsStmt.get(newPath)) {
        this.deleteStmt.run(oldPath);
      } else {
        this.renameStmt.run(newPath, oldPath);
      }
    });
  }

  delete(path: string): void {
    this.write("delete", () => {
      this.deleteStmt.run(path);
    });
  }

  listAlbumKeys(): string[] {
    return this.guard("list albums", () =>
      this.albumKeysStmt.all().map((row) => row.name),
    );
  }

  applyAlbumChanges({ create, remove, groupId }: AlbumChanges): void {
    this.write("album update", () => {
      for (const name of remove) this.deleteAlbumStmt.run(name);
      for (const name of create) this.insertAlbumStmt.run(name, groupId);
    });
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw err instanceof StoreError ? err : new StoreError(op, err);
    }
  }

  private write(op: string, fn: () => void): void {
    this.guard(op, () => this.db.transaction(fn)());
  }
}
