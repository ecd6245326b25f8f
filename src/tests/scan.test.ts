import fsp from "node:fs/promises";
import path from "node:path";
import { DEFAULT_EXCLUDED_DIRS, DEFAULT_EXCLUDED_FILES } from "../constants.js";
import { WatchRootMissingError } from "../errors.js";
import type { ExclusionRules } from "../ignore.js";
import { assertWatchRoot, scanTree } from "../scan.js";
import { captureLogs, collect, mkTmp, writeAt } from "./util";

const defaults: ExclusionRules = {
  dirs: DEFAULT_EXCLUDED_DIRS,
  files: DEFAULT_EXCLUDED_FILES,
  patterns: [],
};

describe("scanTree", () => {
  let tmp: string;
  let root: string;

  beforeAll(async () => {
    tmp = await mkTmp("sentinel-scan-");
    root = path.join(tmp, "photos");
    await writeAt(root, "A/1.jpg", "one", 1_700_000_000);
    await writeAt(root, "A/@eaDir/1.jpg/SYNOPHOTO_THUMB_M.jpg", "thumb");
    await writeAt(root, "B/#snapshot/2.jpg", "snap");
    await writeAt(root, "B/2.jpg", "two");
    await writeAt(root, "B/C/Thumbs.db", "cache");
    await writeAt(root, "Thumbs.db", "cache");
    await writeAt(root, "root.jpg", "root");
    await writeAt(root, "B/C/draft.tmp", "tmp");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("yields regular files with relative paths, skipping excluded names at any depth", async () => {
    const hits = await collect(scanTree(root, defaults));
    expect(hits.map((h) => h.path).sort()).toEqual([
      "A/1.jpg",
      "B/2.jpg",
      "B/C/draft.tmp",
      "root.jpg",
    ]);
  });

  test("reports absolute path and mtime in milliseconds", async () => {
    const hits = await collect(scanTree(root, defaults));
    const one = hits.find((h) => h.path === "A/1.jpg");
    expect(one).toEqual({
      kind: "file",
      path: "A/1.jpg",
      absPath: path.join(root, "A", "1.jpg"),
      mtime: 1_700_000_000_000,
    });
  });

  test("gitignore-style patterns apply to relative paths", async () => {
    const hits = await collect(
      scanTree(root, { ...defaults, patterns: ["*.tmp", "B/"] }),
    );
    expect(hits.map((h) => h.path).sort()).toEqual(["A/1.jpg", "root.jpg"]);
  });

  test("emptied exclusion lists let everything through", async () => {
    const hits = await collect(
      scanTree(root, { dirs: [], files: [], patterns: [] }),
    );
    expect(hits).toHaveLength(8);
  });

  test("the walk finishes, and stopping early releases it", async () => {
    for await (const hit of scanTree(root, defaults)) {
      expect(hit.kind).toBe("file");
      break;
    }
    const again = await collect(scanTree(root, defaults));
    expect(again).toHaveLength(4);
  });

  test("a missing root is rejected", async () => {
    await expect(
      collect(scanTree(path.join(tmp, "nope"), defaults)),
    ).rejects.toThrow(WatchRootMissingError);
  });

  test("a file is not a valid root", async () => {
    await expect(assertWatchRoot(path.join(root, "root.jpg"))).rejects.toThrow(
      `watch root '${path.join(root, "root.jpg")}' does not exist or is not a directory`,
    );
  });
});

// root can list any directory, so permissions cannot hide one from it
const asUser = process.getuid?.() === 0 ? test.skip : test;

describe("scanTree with an unreadable directory", () => {
  let tmp: string;
  let root: string;

  beforeAll(async () => {
    tmp = await mkTmp("sentinel-scan-locked-");
    root = path.join(tmp, "photos");
    await writeAt(root, "Home/1.jpg", "one");
    await writeAt(root, "Trip/2.jpg", "two");
    await fsp.chmod(path.join(root, "Trip"), 0o000);
  });

  afterAll(async () => {
    await fsp.chmod(path.join(root, "Trip"), 0o755);
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  asUser("reports the directory instead of silently dropping it", async () => {
    const { logger, entries } = captureLogs();
    const items = await collect(scanTree(root, defaults, { logger }));
    expect(items.filter((i) => i.kind === "file").map((i) => i.path)).toEqual(
      ["Home/1.jpg"],
    );
    const locked = items.filter((i) => i.kind === "unreadable-dir");
    expect(locked.map((i) => i.path)).toEqual(["Trip"]);
    expect(entries.map((e) => e.message)).toEqual([
      "skipping unreadable directory",
    ]);
  });
});
