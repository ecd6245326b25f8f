// src/report.ts
import fs from "node:fs/promises";
import path from "node:path";
import type { Database } from "./db.js";
import {
  countFiles,
  listAlbums,
  listGroups,
  listMembers,
} from "./manage.js";

const TITLE = "Album Sentinel System Report";

const STYLE = `
    body {
      background-color: rgb(13 18 23);
      line-height: 1.452;
      color: #c7c7c7;
    }
    table {
      width: 80%;
      margin: 20px auto;
      border-collapse: collapse;
      font-family: Arial, sans-serif;
    }
    th, td {
      border: 1px solid #ddd;
      padding: 8px;
      text-align: center;
      color: #c7c7c7;
    }
    th {
      background-color: rgb(13 18 23);
      font-weight: bold;
    }
    h1 {
      text-align: center;
    }`;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function htmlTable(
  headers: string[],
  rows: (string | number)[][],
): string {
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows
    .map(
      (row) =>
        `<tr>${row.map((cell) => `<td>${escapeHtml(String(cell))}</td>`).join("")}</tr>`,
    )
    .join("\n");
  return `<table border="1">\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

export function renderReport(
  db: Database,
  { now = new Date() }: { now?: Date } = {},
): string {
  const groups = listGroups(db);
  const sections = [
    `<h1>${TITLE}</h1>`,
    `<p style="text-align:center;">Generated ${escapeHtml(now.toISOString())}</p>`,
    htmlTable(["Total Files"], [[countFiles(db).toLocaleString("en-US")]]),
    `<h1>Group Information</h1>`,
    htmlTable(
      ["Group ID", "Group Name"],
      groups.map((g) => [g.id, g.name]),
    ),
    `<h1>Membership Information</h1>`,
    ...groups.flatMap((g) => [
      `<h2 style="text-align:center;">${escapeHtml(g.name)}</h2>`,
      htmlTable(
        ["Member Name", "Member Email"],
        listMembers(db, g.id).map((m) => [m.name, m.email]),
      ),
    ]),
    `<h1>Album Information</h1>`,
    htmlTable(
      ["Album Name", "Group Name"],
      listAlbums(db).map((a) => [a.name, a.group_name]),
    ),
  ];
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${TITLE}</title>
  <style>${STYLE}
  </style>
</head>
<body>
${sections.join("\n<br>\n")}
</body>
</html>
`;
}

export async function writeReport(
  db: Database,
  file: string,
  opts: { now?: Date } = {},
): Promise<string> {
  const abs = path.resolve(file);
  await fs.writeFile(abs, renderReport(db, opts), "utf8");
  return abs;
}
