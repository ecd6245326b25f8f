import ignore from "ignore";
import path from "node:path";
import { toPosix } from "./path-rel.js";

export interface ExclusionRules {
  dirs: string[]; // directory names, matched at any depth
  files: string[]; // file names, matched at any depth
  patterns: string[]; // gitignore-style rules against the relative path
}

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // relative file path
  ignoresDir: (r: string) => boolean; // relative directory path
};

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectListOption(
  value: string,
  previous?: string[] | string,
): string[] {
  const acc = Array.isArray(previous)
    ? [...previous]
    : typeof previous === "string" && previous
      ? [previous]
      : [];
  acc.push(...splitList(value));
  return acc;
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

export function createIgnorer({
  dirs,
  files,
  patterns,
}: ExclusionRules): Ignorer {
  const dirNames = new Set(dirs);
  const fileNames = new Set(files);
  const cleaned = normalizeIgnorePatterns(patterns);
  const matcher = cleaned.length ? ignore().add(cleaned) : null;
  const matches = (r: string) => (matcher ? matcher.ignores(r) : false);
  return {
    ignoresDir: (r) =>
      dirNames.has(path.basename(r)) || matches(`${toPosix(r)}/`),
    ignoresFile: (r) => fileNames.has(path.basename(r)) || matches(toPosix(r)),
  };
}
