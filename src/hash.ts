// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createHash, getHashes } from "node:crypto";
import { FingerprintError } from "./errors.js";

export const DEFAULT_CHUNK_SIZE = 1024 * 1024; // 1MB read chunks

const ENCODING = "hex";

// Curated set we’re willing to expose
export const CURATED_HASH_ALGOS = [
  "sha256",
  "sha512",
  "sha1",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "sha256";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts short shorthands "blake2b" -> blake2b512, "blake2s" -> blake2s256.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  const list = listSupportedHashes();
  if (!requested) return defaultHashAlg();
  const low = requested.trim().toLowerCase();
  const alias =
    low === "blake2b" ? "blake2b512" : low === "blake2s" ? "blake2s256" : low;
  const match = list.find((h) => h === alias);
  if (match) return match;

  throw new Error(
    `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${list.join(", ")}`,
  );
}

export interface DigestOptions {
  chunkSize?: number;
}

/**
 * Content fingerprint of a file as a lowercase hex digest, read in
 * chunkSize pieces. Read failures surface as FingerprintError.
 */
export async function fileDigest(
  alg: string,
  path: string,
  { chunkSize = DEFAULT_CHUNK_SIZE }: DigestOptions = {},
): Promise<string> {
  const h = createHash(alg);
  try {
    await pipeline(
      createReadStream(path, { highWaterMark: chunkSize }),
      async function (src: AsyncIterable<Buffer>) {
        for await (const chunk of src) {
          h.update(chunk);
        }
      },
    );
  } catch (err) {
    throw new FingerprintError(path, err);
  }
  return h.digest(ENCODING);
}

export type Fingerprinter = (absPath: string) => Promise<string>;

export function createFingerprinter(
  alg: string = defaultHashAlg(),
  opts: DigestOptions = {},
): Fingerprinter {
  return (absPath) => fileDigest(alg, absPath, opts);
}
