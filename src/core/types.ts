/**
 * Core type definitions for hostfetch
 */

import { InvalidOptions } from "./errors";

// Branded Types
declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type StorePath = Brand<string, "StorePath">;
export type Hash = Brand<string, "Hash">;
export type Nix32Hash = Brand<string, "Nix32Hash">;

// Digests
export type HashAlgo = "sha256" | "sha512" | "sha1";

export const HASH_ALGOS: readonly HashAlgo[] = ["sha256", "sha512", "sha1"];

/** Digest sizes in bytes */
export const HASH_SIZES: Record<HashAlgo, number> = {
  sha1: 20,
  sha256: 32,
  sha512: 64,
};

export type HashEncoding = "hex" | "nix32" | "base64" | "sri";

/**
 * A digest declared by the caller ahead of time.
 * `value` keeps the caller's spelling for error reports.
 */
export interface ExpectedDigest {
  algo: HashAlgo;
  value: string;
  encoding: HashEncoding;
  bytes: Buffer;
}

/** flat = digest of file bytes, recursive = tree digest */
export type HashMode = "flat" | "recursive";

/** What a retrieval procedure must leave at $out */
export type OutputShape = "file" | "directory";

// Retrieval

export interface RetrievalProcedure {
  builder: string;
  args: string[];
  env: Record<string, string>;
  /** Whether the procedure needs network egress */
  network: boolean;
}

export interface PostFetch {
  /** Extract the fetched archive before hashing */
  unpack?: boolean;
  /** Collapse a single wrapper directory after extraction (default true) */
  stripRoot?: boolean;
  /** Relative path to keep; everything else is pruned before hashing */
  subPath?: string;
}

// FixedOutputDerivation (input to the builder)
export interface FixedOutputDerivation {
  name: string;
  /** Human-readable locator, carried into errors and logs */
  locator: string;
  procedure: RetrievalProcedure;
  outputShape: OutputShape;
  outputHash: ExpectedDigest;
  postFetch?: PostFetch;
}

// Artifact (the verified, published result)
export interface Artifact {
  path: StorePath;
  name: string;
  mode: HashMode;
  algo: HashAlgo;
  /** SRI form of the verified digest */
  hash: string;
}

export interface StoreConfig {
  storeDir: string;
}

export const DEFAULT_STORE_DIR = "/hostfetch/store";

/**
 * Exit codes procedures use to classify failures.
 * Anything else non-zero is a generic retrieval failure.
 */
export const EXIT_NOT_FOUND = 44;
export const EXIT_HOST_UNAVAILABLE = 69;

/** Shell statuses for a command that exists but cannot run, or is missing */
export const EXIT_CANNOT_EXECUTE = 126;
export const EXIT_COMMAND_NOT_FOUND = 127;

const NAME_PATTERN = /^[a-zA-Z0-9+\-._?=]+$/;

/**
 * Artifact names become the last segment of a store path.
 */
export function validateArtifactName(name: string, locator = ""): void {
  if (name.length === 0 || name.length > 211) {
    throw new InvalidOptions(locator, `invalid artifact name length: '${name}'`);
  }
  if (name.startsWith(".") || !NAME_PATTERN.test(name)) {
    throw new InvalidOptions(locator, `invalid artifact name: '${name}'`);
  }
}
