// src/config.ts
import fs from "node:fs";
import os from "node:os";
import { join } from "node:path";
import {
  CLI_NAME,
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_EXCLUDED_FILES,
} from "./constants.js";
import { SentinelError } from "./errors.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { splitList, type ExclusionRules } from "./ignore.js";

export interface MailConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
}

export interface SentinelConfig {
  watchRoot: string;
  dbPath: string;
  exclusions: ExclusionRules;
  hashAlg: HashAlg;
  notifyInitial: boolean;
  sendIntervalMs: number;
  mail?: MailConfig;
}

export interface ConfigOverrides {
  root?: string;
  db?: string;
  excludeDir?: string[];
  excludeFile?: string[];
  ignore?: string[];
  hash?: string;
  notifyInitial?: boolean;
  sendInterval?: string;
}

type Env = Record<string, string | undefined>;

export function getSentinelHome(env: Env = process.env): string {
  const explicit = env.SENTINEL_HOME?.trim();
  if (explicit) {
    return ensureDir(expandHome(explicit));
  }

  // XDG first
  const xdg = env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) {
    return ensureDir(join(expandHome(xdg), CLI_NAME));
  }

  // Platform defaults
  const home = os.homedir();
  if (process.platform === "darwin") {
    return ensureDir(join(home, "Library", "Application Support", CLI_NAME));
  }
  if (process.platform === "win32") {
    const appData = env.APPDATA || join(home, "AppData", "Roaming");
    return ensureDir(join(appData, CLI_NAME));
  }
  // Linux/other
  return ensureDir(join(home, ".local", "share", CLI_NAME));
}

export function getDefaultDbPath(env: Env = process.env): string {
  return join(getSentinelHome(env), "sentinel.db");
}

export function resolveDbPath(env: Env = process.env, override?: string) {
  return expandHome(
    override ?? (env.SENTINEL_DB?.trim() || getDefaultDbPath(env)),
  );
}

function ensureDir(p: string): string {
  fs.mkdirSync(p, { recursive: true });
  return p;
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return join(os.homedir(), p.slice(2));
  return p;
}

function parseInteger(raw: string, name: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new SentinelError(`${name} must be a non-negative integer: ${raw}`);
  }
  return n;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw == null || !raw.trim()) return fallback;
  const normalized = raw.trim().toLowerCase();
  return normalized !== "0" && normalized !== "false" && normalized !== "no";
}

export function loadMailConfig(env: Env = process.env): MailConfig | undefined {
  const host = env.SMTP_HOST?.trim();
  const from = env.SENDER_EMAIL?.trim();
  if (!host || !from) return undefined;
  const port = env.SMTP_PORT?.trim()
    ? parseInteger(env.SMTP_PORT.trim(), "SMTP_PORT")
    : 465;
  return {
    host,
    port,
    // implicit TLS on 465, STARTTLS elsewhere unless told otherwise
    secure: parseBool(env.SMTP_SECURE, port === 465),
    user: env.SMTP_USER?.trim() || undefined,
    pass: env.SMTP_PASS || undefined,
    from,
  };
}

/**
 * Build the run configuration from the environment, with CLI options taking
 * precedence. Exclusion lists given on the command line replace the
 * environment's (and the defaults).
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
): SentinelConfig {
  const watchRoot = overrides.root ?? env.SENTINEL_WATCH_ROOT?.trim();
  if (!watchRoot) {
    throw new SentinelError(
      "no watch root configured; set SENTINEL_WATCH_ROOT or pass --root",
    );
  }
  const envDirs = env.SENTINEL_EXCLUDE_DIRS;
  const envFiles = env.SENTINEL_EXCLUDE_FILES;
  const sendInterval = overrides.sendInterval ?? env.SENTINEL_SEND_INTERVAL_MS;
  return {
    watchRoot: expandHome(watchRoot),
    dbPath: resolveDbPath(env, overrides.db),
    exclusions: {
      dirs: overrides.excludeDir?.length
        ? overrides.excludeDir
        : envDirs != null
          ? splitList(envDirs)
          : DEFAULT_EXCLUDED_DIRS,
      files: overrides.excludeFile?.length
        ? overrides.excludeFile
        : envFiles != null
          ? splitList(envFiles)
          : DEFAULT_EXCLUDED_FILES,
      patterns: [
        ...splitList(env.SENTINEL_IGNORE),
        ...(overrides.ignore ?? []),
      ],
    },
    hashAlg: normalizeHashAlg(overrides.hash ?? env.SENTINEL_HASH),
    notifyInitial:
      overrides.notifyInitial ?? parseBool(env.SENTINEL_NOTIFY_INITIAL, false),
    sendIntervalMs: sendInterval?.trim()
      ? parseInteger(sendInterval.trim(), "send interval")
      : 0,
    mail: loadMailConfig(env),
  };
}
