// src/run.ts
import { countNewByAlbum, reconcileAlbums } from "./albums.js";
import type { SentinelConfig } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { getDb, getMeta, setMeta } from "./db.js";
import { createFingerprinter } from "./hash.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import {
  createSmtpMailer,
  dispatchNotifications,
  type Mailer,
} from "./notify.js";
import { reconcile } from "./reconcile.js";
import { assertWatchRoot, scanTree } from "./scan.js";
import { SqliteStateStore } from "./store.js";

export interface RunDeps {
  logger?: Logger;
  mailer?: Mailer | null;
  now?: () => Date;
}

export interface RunSummary {
  initial: boolean;
  scanned: number;
  hashed: number;
  added: number;
  moved: number;
  deleted: number;
  skipped: number;
  unreadableDirs: number;
  albumsCreated: string[];
  albumsRemoved: string[];
  newByAlbum: Record<string, number>;
  notified: number;
  notifyFailed: number;
  elapsedMs: number;
}

export function formatElapsed(ms: number): string {
  const total = ms / 1000;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total - hours * 3600 - minutes * 60;
  return `${hours} hour(s), ${minutes} minute(s), ${seconds.toFixed(2)} second(s)`;
}

/**
 * One full pass: scan, reconcile, album maintenance, notification.
 * A store failure aborts before albums or notifications are touched.
 */
export async function runSentinel(
  config: SentinelConfig,
  {
    logger = new ConsoleLogger(),
    mailer,
    now = () => new Date(),
  }: RunDeps = {},
): Promise<RunSummary> {
  const t0 = Date.now();
  const root = await assertWatchRoot(config.watchRoot);
  const db = getDb(config.dbPath);
  try {
    const store = new SqliteStateStore(db);
    // the first completed pass is an import, not news
    const initial = getMeta(db, "initialized_at") == null;
    logger.info("scanning", { root, db: config.dbPath });

    const result = await reconcile(
      scanTree(root, config.exclusions, { logger: logger.child("scan") }),
      store,
      {
        fingerprint: createFingerprinter(config.hashAlg),
        logger: logger.child("reconcile"),
      },
    );

    const albums = reconcileAlbums(store);
    for (const name of albums.created) {
      logger.info("album added", { album: name });
    }
    for (const name of albums.removed) {
      logger.info("album removed", { album: name });
    }

    for (const entry of result.added) {
      logger.info("new file", {
        path: entry.path,
        fingerprint: entry.fingerprint,
      });
    }
    for (const move of result.moved) {
      logger.info("file moved", { from: move.oldPath, to: move.newPath });
    }
    for (const p of result.deleted) {
      logger.info("file removed", { path: p });
    }

    const counts = countNewByAlbum(result.added);
    let notified = 0;
    let notifyFailed = 0;
    const transport =
      mailer === undefined
        ? config.mail
          ? createSmtpMailer(config.mail)
          : null
        : mailer;
    if (counts.size > 0 && initial && !config.notifyInitial) {
      logger.info("initial import; notifications skipped", {
        files: result.added.length,
        albums: counts.size,
      });
      logger.info(
        `run '${CLI_NAME} manage' to set up groups, members and album links`,
      );
    } else if (counts.size > 0 && !transport) {
      logger.warn("mail is not configured; notifications disabled", {
        albums: Object.fromEntries(counts),
      });
    } else if (counts.size > 0 && transport) {
      const sent = await dispatchNotifications(db, counts, transport, {
        logger: logger.child("notify"),
        now,
        sendIntervalMs: config.sendIntervalMs,
      });
      notified = sent.sent;
      notifyFailed = sent.failed;
    }

    const summary: RunSummary = {
      initial,
      scanned: result.scanned,
      hashed: result.hashed,
      added: result.added.length,
      moved: result.moved.length,
      deleted: result.deleted.length,
      skipped: result.skipped.length,
      unreadableDirs: result.unreadableDirs.length,
      albumsCreated: albums.created,
      albumsRemoved: albums.removed,
      newByAlbum: Object.fromEntries(counts),
      notified,
      notifyFailed,
      elapsedMs: Date.now() - t0,
    };
    if (initial) setMeta(db, "initialized_at", String(now().getTime()));
    setMeta(db, "last_run", JSON.stringify({ ts: now().getTime(), summary }));

    logger.info(
      `${summary.added} new, ${summary.moved} moved, ${summary.deleted} removed, ${summary.skipped} skipped`,
      {
        scanned: summary.scanned,
        hashed: summary.hashed,
        unreadableDirs: summary.unreadableDirs,
      },
    );
    logger.info(`total execution time: ${formatElapsed(summary.elapsedMs)}`);
    return summary;
  } finally {
    db.close();
  }
}
