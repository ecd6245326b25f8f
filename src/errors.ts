// src/errors.ts

export class SentinelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class WatchRootMissingError extends SentinelError {
  constructor(readonly root: string) {
    super(`watch root '${root}' does not exist or is not a directory`);
  }
}

export class FingerprintError extends SentinelError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`unable to fingerprint '${path}': ${describeError(cause)}`, {
      cause,
    });
  }
}

export class StoreError extends SentinelError {
  constructor(
    readonly op: string,
    cause: unknown,
  ) {
    super(`store ${op} failed: ${describeError(cause)}`, { cause });
  }
}

// Invalid input to an administration operation (unknown id, bad email, ...).
export class ManageError extends SentinelError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
