// src/manage-menu.ts
import { createInterface } from "node:readline/promises";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { Database } from "./db.js";
import { ManageError } from "./errors.js";
import {
  addAlbum,
  addGroup,
  addMember,
  duplicateAlbum,
  linkAlbum,
  listAlbums,
  listGroups,
  listMembers,
  parseId,
  removeGroup,
  removeMember,
} from "./manage.js";
import { writeReport } from "./report.js";

export type MenuCommand =
  | "add-group"
  | "remove-group"
  | "add-member"
  | "remove-member"
  | "add-album"
  | "link-album"
  | "duplicate-album"
  | "report"
  | "exit";

export const MENU: {
  key: string;
  command: MenuCommand;
  label: string;
  description: string;
}[] = [
  {
    key: "1",
    command: "add-group",
    label: "Add Group",
    description: "Adds a new group",
  },
  {
    key: "2",
    command: "remove-group",
    label: "Remove Group",
    description: "Removes a group and its members",
  },
  {
    key: "3",
    command: "add-member",
    label: "Add Group Member",
    description: "Adds a new member to a group",
  },
  {
    key: "4",
    command: "remove-member",
    label: "Remove Group Member",
    description: "Removes a member from a group",
  },
  {
    key: "5",
    command: "add-album",
    label: "Add Album",
    description: "Adds a new album",
  },
  {
    key: "6",
    command: "link-album",
    label: "Update Album/Group Link",
    description: "Links an album to a different group",
  },
  {
    key: "7",
    command: "duplicate-album",
    label: "Duplicate Album",
    description: "Links an existing album to another group",
  },
  {
    key: "R",
    command: "report",
    label: "Create Report",
    description: "Writes the HTML system report",
  },
  {
    key: "X",
    command: "exit",
    label: "Exit",
    description: "Leaves the menu",
  },
];

export function parseMenuKey(raw: string): MenuCommand | null {
  const key = raw.trim().toUpperCase();
  return MENU.find((item) => item.key === key)?.command ?? null;
}

export interface Prompter {
  question(prompt: string): Promise<string>;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  return {
    question: (prompt) => rl.question(prompt),
    close: () => rl.close(),
  };
}

export interface MenuOptions {
  prompter: Prompter;
  print?: (text: string) => void;
  reportFile: string;
}

function renderTable(
  title: string,
  heading: string[],
  rows: (string | number)[][],
): string {
  const table = new AsciiTable3(title)
    .setHeading(...heading)
    .setStyle("unicode-round");
  heading.forEach((_, idx) => table.setAlign(idx + 1, AlignmentEnum.LEFT));
  table.addRowMatrix(rows);
  return table.toString();
}

export function renderMenu(): string {
  return renderTable(
    "Main Menu",
    ["Key", "Menu Option", "Description"],
    MENU.map((item) => [item.key, item.label, item.description]),
  );
}

/**
 * Interactive administration loop. Any prompt answered with X returns to the
 * main menu; X at the main menu leaves.
 */
export async function runManageMenu(
  db: Database,
  { prompter, print = (text) => console.log(text), reportFile }: MenuOptions,
): Promise<void> {
  // null when the operator cancels
  const ask = async (prompt: string): Promise<string | null> => {
    const answer = await prompter.question(
      `${prompt} (or type 'X' to cancel): `,
    );
    return answer.trim().toUpperCase() === "X" ? null : answer;
  };

  const showGroups = () =>
    print(
      renderTable(
        "Groups",
        ["Group ID", "Name"],
        listGroups(db).map((g) => [g.id, g.name]),
      ),
    );

  const showAlbums = () =>
    print(
      renderTable(
        "Albums",
        ["Album ID", "Album Name", "Group Name"],
        listAlbums(db).map((a) => [a.id, a.name, a.group_name]),
      ),
    );

  const perform = async (command: MenuCommand): Promise<void> => {
    switch (command) {
      case "add-group": {
        const name = await ask("Enter a name for the new group");
        if (name == null) return;
        const group = addGroup(db, name);
        print(`Group '${group.name}' added successfully.`);
        return;
      }
      case "remove-group": {
        showGroups();
        const raw = await ask("Enter the Group ID to remove");
        if (raw == null) return;
        const id = parseId(raw, "Group ID");
        const removed = removeGroup(db, id);
        print(
          `Group ${id} removed with ${removed.members} member(s); ${removed.albumsRelinked} album(s) moved to the unassigned group.`,
        );
        return;
      }
      case "add-member": {
        showGroups();
        const raw = await ask("Enter the Group ID to add a member to");
        if (raw == null) return;
        const groupId = parseId(raw, "Group ID");
        const name = await ask("Enter the member's name");
        if (name == null) return;
        const email = await ask("Enter the member's email");
        if (email == null) return;
        const member = addMember(db, groupId, name, email);
        print(`Member ${member.name} added successfully to group ${groupId}.`);
        return;
      }
      case "remove-member": {
        showGroups();
        const raw = await ask("Enter the Group ID to remove a member from");
        if (raw == null) return;
        const groupId = parseId(raw, "Group ID");
        print(
          renderTable(
            "Members",
            ["Member ID", "Name", "Email"],
            listMembers(db, groupId).map((m) => [m.id, m.name, m.email]),
          ),
        );
        const rawMember = await ask("Enter the Member ID to remove");
        if (rawMember == null) return;
        const memberId = parseId(rawMember, "Member ID");
        removeMember(db, groupId, memberId);
        print(`Member ${memberId} removed from group ${groupId}.`);
        return;
      }
      case "add-album": {
        const name = await ask("Enter the name of the new album");
        if (name == null) return;
        showGroups();
        const raw = await ask("Enter the Group ID for the new album");
        if (raw == null) return;
        const album = addAlbum(db, name, parseId(raw, "Group ID"));
        print(`Album ${album.name} added to group ${album.group_name}.`);
        return;
      }
      case "link-album":
      case "duplicate-album": {
        showAlbums();
        const verb = command === "link-album" ? "update" : "duplicate";
        const rawAlbum = await ask(`Enter the Album ID to ${verb}`);
        if (rawAlbum == null) return;
        const albumId = parseId(rawAlbum, "Album ID");
        showGroups();
        const rawGroup = await ask("Enter the new Group ID for the album");
        if (rawGroup == null) return;
        const groupId = parseId(rawGroup, "Group ID");
        const album =
          command === "link-album"
            ? linkAlbum(db, albumId, groupId)
            : duplicateAlbum(db, albumId, groupId);
        print(`Album '${album.name}' is now linked to ${album.group_name}.`);
        return;
      }
      case "report": {
        const file = await writeReport(db, reportFile);
        print(`System report saved to ${file}`);
        return;
      }
      case "exit":
        return;
    }
  };

  while (true) {
    print(renderMenu());
    const raw = await prompter.question(
      "Press a key for item selection or press X to exit: ",
    );
    const command = parseMenuKey(raw);
    if (command == null) {
      print(`Unknown selection '${raw.trim()}'.`);
      continue;
    }
    if (command === "exit") {
      print("Exiting.");
      return;
    }
    try {
      await perform(command);
    } catch (err) {
      if (!(err instanceof ManageError)) throw err;
      print(err.message);
    }
  }
}
