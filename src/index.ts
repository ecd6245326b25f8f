export {
  loadConfig,
  loadMailConfig,
  getSentinelHome,
  resolveDbPath,
  type SentinelConfig,
  type MailConfig,
  type ConfigOverrides,
} from "./config.js";

export { getDb, getMeta, setMeta, type Database } from "./db.js";

export {
  SqliteStateStore,
  type StateStore,
  type FileRecord,
  type AlbumChanges,
} from "./store.js";

export {
  fileDigest,
  createFingerprinter,
  normalizeHashAlg,
  listSupportedHashes,
  type Fingerprinter,
  type HashAlg,
} from "./hash.js";

export { createIgnorer, type ExclusionRules, type Ignorer } from "./ignore.js";

export {
  scanTree,
  assertWatchRoot,
  type ScanHit,
  type ScanItem,
  type UnreadableDir,
} from "./scan.js";

export {
  reconcile,
  classifyChanges,
  type ScanEntry,
  type FileMove,
  type ChangeSet,
  type ReconcileResult,
} from "./reconcile.js";

export {
  deriveAlbumKey,
  albumKeysFor,
  reconcileAlbums,
  countNewByAlbum,
} from "./albums.js";

export {
  dispatchNotifications,
  resolveSubscribers,
  createSmtpMailer,
  buildMessage,
  type Mailer,
  type MailMessage,
  type Subscriber,
} from "./notify.js";

export { runSentinel, type RunSummary, type RunDeps } from "./run.js";

export * as manage from "./manage.js";
export { runManageMenu, parseMenuKey, type MenuCommand } from "./manage-menu.js";
export { renderReport, writeReport } from "./report.js";

export {
  SentinelError,
  WatchRootMissingError,
  FingerprintError,
  StoreError,
  ManageError,
} from "./errors.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
