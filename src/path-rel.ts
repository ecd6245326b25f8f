// src/path-rel.ts
import path from "node:path";

// Relative paths are stored with the platform separator, as produced here.
export function toRel(abs: string, root: string): string {
  if (abs === root) return "";
  if (abs.startsWith(root + path.sep)) return abs.slice(root.length + 1);
  return path.relative(root, abs);
}

export function toPosix(rel: string): string {
  return rel.split(path.sep).join("/");
}
