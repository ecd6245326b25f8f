// src/cli-util.ts
import { loadConfig, type ConfigOverrides } from "./config.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { runSentinel, type RunDeps, type RunSummary } from "./run.js";

/**
 * Run a command body, reporting a fatal error once. Resolves to the process
 * exit code: 0 on success, 1 on failure.
 */
export async function guarded(
  logger: Logger,
  fn: () => Promise<unknown>,
): Promise<number> {
  try {
    await fn();
    return 0;
  } catch (err) {
    logger.error(describeError(err));
    return 1;
  }
}

// Body of the `run` command.
export async function runCommand(
  opts: ConfigOverrides,
  {
    env = process.env,
    ...deps
  }: RunDeps & { env?: Record<string, string | undefined> } = {},
): Promise<RunSummary> {
  return runSentinel(loadConfig(env, opts), deps);
}
