import { getDb, type Database } from "../db.js";
import { ManageError } from "../errors.js";
import {
  addAlbum,
  addGroup,
  addMember,
  countFiles,
  duplicateAlbum,
  isValidEmail,
  linkAlbum,
  listAlbums,
  listGroups,
  listMembers,
  parseId,
  removeGroup,
  removeMember,
} from "../manage.js";
import { SqliteStateStore } from "../store.js";

describe("manage", () => {
  let db: Database;

  beforeEach(() => {
    db = getDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("groups", () => {
    test("names are trimmed and unique", () => {
      expect(addGroup(db, "  Family ")).toEqual({ id: 2, name: "Family" });
      expect(() => addGroup(db, "Family")).toThrow(
        "The group name 'Family' already exists",
      );
      expect(() => addGroup(db, "   ")).toThrow(ManageError);
      expect(listGroups(db)).toEqual([
        { id: 1, name: "Unassigned" },
        { id: 2, name: "Family" },
      ]);
    });

    test("the unassigned group cannot be removed", () => {
      expect(() => removeGroup(db, 1)).toThrow(
        "the unassigned group cannot be removed",
      );
    });

    test("removing an unknown group is reported", () => {
      expect(() => removeGroup(db, 42)).toThrow("Group ID 42 does not exist");
    });

    test("removal deletes members and moves albums to the unassigned group", () => {
      const store = new SqliteStateStore(db);
      const family = addGroup(db, "Family");
      addMember(db, family.id, "Bob", "bob@example.com");
      addMember(db, family.id, "Carol", "carol@example.com");
      // "A" is linked to both groups, "B" only to Family
      store.applyAlbumChanges({ create: ["A"], remove: [], groupId: 1 });
      duplicateAlbum(db, 1, family.id);
      addAlbum(db, "B", family.id);

      expect(removeGroup(db, family.id)).toEqual({
        members: 2,
        albumsRelinked: 1,
        albumsDropped: 1,
      });
      expect(listGroups(db)).toEqual([{ id: 1, name: "Unassigned" }]);
      expect(listMembers(db, family.id)).toEqual([]);
      expect(
        listAlbums(db).map((a) => [a.name, a.group_id, a.group_name]),
      ).toEqual([
        ["A", 1, "Unassigned"],
        ["B", 1, "Unassigned"],
      ]);
    });
  });

  describe("members", () => {
    test("email addresses are validated", () => {
      expect(isValidEmail("first.last+tag@mail.example.org")).toBe(true);
      expect(isValidEmail("nope")).toBe(false);
      expect(isValidEmail("a@b")).toBe(false);
      expect(() => addMember(db, 1, "Bob", "nope")).toThrow(
        "'nope' is not a valid email address",
      );
    });

    test("members belong to an existing group", () => {
      expect(() => addMember(db, 9, "Bob", "bob@example.com")).toThrow(
        "Group ID 9 does not exist",
      );
    });

    test("add then remove", () => {
      const member = addMember(db, 1, " Bob ", " bob@example.com ");
      expect(member).toEqual({
        id: 1,
        name: "Bob",
        email: "bob@example.com",
        group_id: 1,
      });
      expect(() => removeMember(db, 1, 5)).toThrow(
        "Member ID 5 does not exist in Group ID 1",
      );
      removeMember(db, 1, member.id);
      expect(listMembers(db, 1)).toEqual([]);
    });
  });

  describe("albums", () => {
    test("a name can only be added once", () => {
      addAlbum(db, "Trip", 1);
      expect(() => addAlbum(db, "Trip", 1)).toThrow("Album Trip already exists");
    });

    test("linking moves an album to another group", () => {
      const family = addGroup(db, "Family");
      const album = addAlbum(db, "Trip", 1);
      expect(linkAlbum(db, album.id, family.id)).toEqual({
        id: album.id,
        name: "Trip",
        group_id: family.id,
        group_name: "Family",
      });
      // relinking to the same group changes nothing
      expect(linkAlbum(db, album.id, family.id).group_name).toBe("Family");
      expect(() => linkAlbum(db, 99, family.id)).toThrow(
        "Album ID 99 does not exist",
      );
    });

    test("linking onto an existing link for the same name is refused", () => {
      const family = addGroup(db, "Family");
      const album = addAlbum(db, "Trip", 1);
      duplicateAlbum(db, album.id, family.id);
      expect(() => linkAlbum(db, album.id, family.id)).toThrow(
        "Album 'Trip' is already linked to group 'Family'",
      );
      expect(() => duplicateAlbum(db, album.id, family.id)).toThrow(
        "Album 'Trip' is already linked to group 'Family'",
      );
    });

    test("duplicating keeps the original link", () => {
      const family = addGroup(db, "Family");
      const album = addAlbum(db, "Trip", 1);
      duplicateAlbum(db, album.id, family.id);
      expect(listAlbums(db).map((a) => a.group_name)).toEqual([
        "Family",
        "Unassigned",
      ]);
    });
  });

  test("parseId accepts positive integers only", () => {
    expect(parseId(" 3 ", "Group ID")).toBe(3);
    expect(() => parseId("abc", "Group ID")).toThrow(
      "Group ID must be a positive integer, got 'abc'",
    );
    expect(() => parseId("0", "Member ID")).toThrow(ManageError);
    expect(() => parseId("", "Album ID")).toThrow(ManageError);
    expect(() => parseId("1.5", "Album ID")).toThrow(ManageError);
  });

  test("countFiles", () => {
    const store = new SqliteStateStore(db);
    expect(countFiles(db)).toBe(0);
    store.upsert({ path: "a.jpg", fingerprint: "x", mtime: 1 });
    expect(countFiles(db)).toBe(1);
  });
});
