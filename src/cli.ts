#!/usr/bin/env node
// src/cli.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command, Option } from "commander";
import { guarded, runCommand } from "./cli-util.js";
import { resolveDbPath, type ConfigOverrides } from "./config.js";
import { CLI_NAME, DEFAULT_REPORT_FILE } from "./constants.js";
import { getDb } from "./db.js";
import { describeError } from "./errors.js";
import { collectListOption } from "./ignore.js";
import { listSupportedHashes } from "./hash.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { createPrompter, runManageMenu } from "./manage-menu.js";
import { writeReport } from "./report.js";

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // no package.json beside dist/
  }
  return "0.0.0";
}

function loggerFor(command: Command): Logger {
  const { logLevel } = command.optsWithGlobals<{ logLevel?: string }>();
  return new ConsoleLogger(
    parseLogLevel(logLevel ?? process.env.SENTINEL_LOG_LEVEL, "info"),
  );
}

const program = new Command()
  .name(CLI_NAME)
  .description(
    "Detect new, moved and removed files under a directory tree and email album subscribers",
  )
  .version(packageVersion())
  .option(
    "--log-level <level>",
    `log verbosity (${LOG_LEVELS.join(", ")})`,
  );

program
  .command("run", { isDefault: true })
  .description("scan the watch root, update the store and send notifications")
  .option(
    "--root <path>",
    "directory to watch (default: $SENTINEL_WATCH_ROOT)",
  )
  .option("--db <file>", "path to the sqlite database")
  .option(
    "--exclude-dir <name>",
    "directory name to skip at any depth (repeat or comma-separated)",
    collectListOption,
    [] as string[],
  )
  .option(
    "--exclude-file <name>",
    "file name to skip at any depth (repeat or comma-separated)",
    collectListOption,
    [] as string[],
  )
  .option(
    "-i, --ignore <pattern>",
    "gitignore-style ignore rule (repeat or comma-separated)",
    collectListOption,
    [] as string[],
  )
  .addOption(
    new Option("--hash <algorithm>", "content hash algorithm").choices(
      listSupportedHashes(),
    ),
  )
  .option(
    "--notify-initial",
    "send notifications for the files found by the first run",
  )
  .option(
    "--send-interval <milliseconds>",
    "pause between notification emails",
  )
  .action(async (opts: ConfigOverrides, command: Command) => {
    const logger = loggerFor(command);
    process.exitCode = await guarded(logger, () =>
      runCommand(opts, { logger }),
    );
  });

program
  .command("manage")
  .description("interactive group, member and album administration")
  .option("--db <file>", "path to the sqlite database")
  .option(
    "--report <file>",
    "where the report option writes",
    DEFAULT_REPORT_FILE,
  )
  .action(async (opts: { db?: string; report: string }, command: Command) => {
    const logger = loggerFor(command);
    process.exitCode = await guarded(logger, async () => {
      const db = getDb(resolveDbPath(process.env, opts.db));
      const prompter = createPrompter();
      try {
        await runManageMenu(db, { prompter, reportFile: opts.report });
      } finally {
        prompter.close();
        db.close();
      }
    });
  });

program
  .command("report")
  .description("write the HTML system report")
  .option("--db <file>", "path to the sqlite database")
  .option("--out <file>", "output file", DEFAULT_REPORT_FILE)
  .action(async (opts: { db?: string; out: string }, command: Command) => {
    const logger = loggerFor(command);
    process.exitCode = await guarded(logger, async () => {
      const db = getDb(resolveDbPath(process.env, opts.db));
      try {
        const file = await writeReport(db, opts.out);
        logger.info("system report saved", { file });
      } finally {
        db.close();
      }
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`${CLI_NAME} fatal:`, describeError(err));
  process.exit(1);
});
