// src/manage.ts
//
// Group, member and album administration. Every function validates its
// references and throws ManageError with a message fit for the operator.

import { UNASSIGNED_GROUP_ID } from "./constants.js";
import type { Database } from "./db.js";
import { ManageError } from "./errors.js";

export interface GroupRow {
  id: number;
  name: string;
}

export interface MemberRow {
  id: number;
  name: string;
  email: string;
  group_id: number;
}

export interface AlbumRow {
  id: number;
  name: string;
  group_id: number;
  group_name: string;
}

const EMAIL_RE = /^[\w.+-]+@[\w.-]+\.\w+$/;

export function isValidEmail(email: string): boolean {
  return EMAIL_RE.test(email.trim());
}

export function parseId(raw: string, what: string): number {
  const trimmed = raw.trim();
  const n = Number(trimmed);
  if (!trimmed || !Number.isInteger(n) || n <= 0) {
    throw new ManageError(`${what} must be a positive integer, got '${raw}'`);
  }
  return n;
}

export function listGroups(db: Database): GroupRow[] {
  return db
    .prepare<[], GroupRow>(
      `SELECT id, name FROM subscriber_groups ORDER BY id`,
    )
    .all();
}

export function getGroup(db: Database, id: number): GroupRow | undefined {
  return db
    .prepare<[number], GroupRow>(
      `SELECT id, name FROM subscriber_groups WHERE id = ?`,
    )
    .get(id);
}

function requireGroup(db: Database, id: number): GroupRow {
  const group = getGroup(db, id);
  if (!group) throw new ManageError(`Group ID ${id} does not exist`);
  return group;
}

export function addGroup(db: Database, name: string): GroupRow {
  const trimmed = name.trim();
  if (!trimmed) throw new ManageError("group name must not be empty");
  const existing = db
    .prepare<[string], GroupRow>(
      `SELECT id, name FROM subscriber_groups WHERE name = ?`,
    )
    .get(trimmed);
  if (existing) {
    throw new ManageError(`The group name '${trimmed}' already exists`);
  }
  const info = db
    .prepare<[string]>(`INSERT INTO subscriber_groups(name) VALUES(?)`)
    .run(trimmed);
  return { id: Number(info.lastInsertRowid), name: trimmed };
}

/**
 * Remove a group and its members. Albums linked to it fall back to the
 * unassigned group; a link that would duplicate an existing unassigned link
 * for the same album is dropped instead.
 */
export function removeGroup(
  db: Database,
  id: number,
): { members: number; albumsRelinked: number; albumsDropped: number } {
  if (id === UNASSIGNED_GROUP_ID) {
    throw new ManageError("the unassigned group cannot be removed");
  }
  requireGroup(db, id);
  return db.transaction(() => {
    const members = db
      .prepare<[number]>(`DELETE FROM members WHERE group_id = ?`)
      .run(id).changes;
    const albumsDropped = db
      .prepare<[number, number]>(
        `DELETE FROM albums
          WHERE group_id = ?
            AND name IN (SELECT name FROM albums WHERE group_id = ?)`,
      )
      .run(id, UNASSIGNED_GROUP_ID).changes;
    const albumsRelinked = db
      .prepare<[number, number]>(
        `UPDATE albums SET group_id = ? WHERE group_id = ?`,
      )
      .run(UNASSIGNED_GROUP_ID, id).changes;
    db.prepare<[number]>(`DELETE FROM subscriber_groups WHERE id = ?`).run(
      id,
    );
    return { members, albumsRelinked, albumsDropped };
  })();
}

export function listMembers(db: Database, groupId: number): MemberRow[] {
  return db
    .prepare<[number], MemberRow>(
      `SELECT id, name, email, group_id FROM members WHERE group_id = ? ORDER BY id`,
    )
    .all(groupId);
}

export function addMember(
  db: Database,
  groupId: number,
  name: string,
  email: string,
): MemberRow {
  requireGroup(db, groupId);
  const trimmedName = name.trim();
  const trimmedEmail = email.trim();
  if (!trimmedName) throw new ManageError("member name must not be empty");
  if (!isValidEmail(trimmedEmail)) {
    throw new ManageError(`'${email}' is not a valid email address`);
  }
  const info = db
    .prepare<[string, string, number]>(
      `INSERT INTO members(name, email, group_id) VALUES(?, ?, ?)`,
    )
    .run(trimmedName, trimmedEmail, groupId);
  return {
    id: Number(info.lastInsertRowid),
    name: trimmedName,
    email: trimmedEmail,
    group_id: groupId,
  };
}

export function removeMember(
  db: Database,
  groupId: number,
  memberId: number,
): void {
  requireGroup(db, groupId);
  const { changes } = db
    .prepare<[number, number]>(
      `DELETE FROM members WHERE id = ? AND group_id = ?`,
    )
    .run(memberId, groupId);
  if (!changes) {
    throw new ManageError(
      `Member ID ${memberId} does not exist in Group ID ${groupId}`,
    );
  }
}

export function listAlbums(db: Database): AlbumRow[] {
  return db
    .prepare<[], AlbumRow>(
      `SELECT a.id AS id, a.name AS name, a.group_id AS group_id, g.name AS group_name
         FROM albums a
         JOIN subscriber_groups g ON g.id = a.group_id
        ORDER BY a.name, g.name`,
    )
    .all();
}

export function getAlbum(db: Database, id: number): AlbumRow | undefined {
  return db
    .prepare<[number], AlbumRow>(
      `SELECT a.id AS id, a.name AS name, a.group_id AS group_id, g.name AS group_name
         FROM albums a
         JOIN subscriber_groups g ON g.id = a.group_id
        WHERE a.id = ?`,
    )
    .get(id);
}

function requireAlbum(db: Database, id: number): AlbumRow {
  const album = getAlbum(db, id);
  if (!album) throw new ManageError(`Album ID ${id} does not exist`);
  return album;
}

function insertAlbumLink(
  db: Database,
  name: string,
  groupId: number,
): AlbumRow {
  const group = requireGroup(db, groupId);
  const info = db
    .prepare<[string, number]>(
      `INSERT OR IGNORE INTO albums(name, group_id) VALUES(?, ?)`,
    )
    .run(name, groupId);
  if (!info.changes) {
    throw new ManageError(
      `Album '${name}' is already linked to group '${group.name}'`,
    );
  }
  return {
    id: Number(info.lastInsertRowid),
    name,
    group_id: groupId,
    group_name: group.name,
  };
}

/**
 * Add an album by name. Albums are normally created by the scanner; one
 * added by hand that matches no directory is removed on the next run.
 */
export function addAlbum(
  db: Database,
  name: string,
  groupId: number,
): AlbumRow {
  const trimmed = name.trim();
  if (!trimmed) throw new ManageError("album name must not be empty");
  const existing = db
    .prepare<[string], { id: number }>(`SELECT id FROM albums WHERE name = ?`)
    .get(trimmed);
  if (existing) {
    throw new ManageError(`Album ${trimmed} already exists`);
  }
  return insertAlbumLink(db, trimmed, groupId);
}

export function linkAlbum(
  db: Database,
  albumId: number,
  groupId: number,
): AlbumRow {
  const album = requireAlbum(db, albumId);
  const group = requireGroup(db, groupId);
  if (album.group_id === groupId) return album;
  const clash = db
    .prepare<[string, number], { id: number }>(
      `SELECT id FROM albums WHERE name = ? AND group_id = ?`,
    )
    .get(album.name, groupId);
  if (clash) {
    throw new ManageError(
      `Album '${album.name}' is already linked to group '${group.name}'`,
    );
  }
  db.prepare<[number, number]>(
    `UPDATE albums SET group_id = ? WHERE id = ?`,
  ).run(groupId, albumId);
  return { ...album, group_id: groupId, group_name: group.name };
}

// Link the same album name to an additional group.
export function duplicateAlbum(
  db: Database,
  albumId: number,
  groupId: number,
): AlbumRow {
  const album = requireAlbum(db, albumId);
  return insertAlbumLink(db, album.name, groupId);
}

export function countFiles(db: Database): number {
  const row = db
    .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM files`)
    .get();
  return row?.n ?? 0;
}
