/**
 * Digest verifier
 *
 * The sole arbiter of whether fetched content is accepted.
 *
 * Tree digests hash a canonical listing of everything below the root:
 *
 *   "hostfetch-tree-v1\0" then, sorted by relative POSIX path,
 *   one record "<kind> <perm> <hex> <relpath>\0" per entry, where
 *     f = regular file: perm "x" when owner-executable else "-", hex = content digest
 *     d = directory:    perm "-", hex "-"
 *     l = symlink:      perm "-", hex = digest of the link target
 *
 * Timestamps, ownership and all other permission bits are not part of it.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { lstatSync, readFileSync, readdirSync, readlinkSync } from "node:fs";
import { join } from "node:path";
import type { ExpectedDigest, HashAlgo, HashEncoding, HashMode } from "./types";
import { HASH_ALGOS, HASH_SIZES } from "./types";
import { hashBytes, nix32Decode, encodeDigest } from "./hash";
import { InvalidExpectedDigest, UnsupportedLocatorShape } from "./errors";

const TREE_HEADER = "hostfetch-tree-v1\0";

export interface TreeDigestOptions {
  /** Whether the owner-executable bit participates (default true) */
  executableBit?: boolean;
  /** Reported with content that cannot be digested */
  locator?: string;
}

// =============================================================================
// Computing
// =============================================================================

export function digestFile(path: string, algo: HashAlgo): Buffer {
  return hashBytes(algo, readFileSync(path));
}

interface TreeEntry {
  rel: string;
  record: string;
}

function collectEntries(
  root: string,
  rel: string,
  algo: HashAlgo,
  opts: Required<TreeDigestOptions>,
  out: TreeEntry[]
): void {
  for (const name of readdirSync(join(root, rel))) {
    const childRel = rel ? `${rel}/${name}` : name;
    const abs = join(root, childRel);
    const stat = lstatSync(abs);

    if (stat.isSymbolicLink()) {
      const target = hashBytes(algo, readlinkSync(abs)).toString("hex");
      out.push({ rel: childRel, record: `l - ${target} ${childRel}\0` });
    } else if (stat.isDirectory()) {
      out.push({ rel: childRel, record: `d - - ${childRel}\0` });
      collectEntries(root, childRel, algo, opts, out);
    } else if (stat.isFile()) {
      const exec = opts.executableBit && (stat.mode & 0o100) !== 0;
      const content = hashBytes(algo, readFileSync(abs)).toString("hex");
      out.push({ rel: childRel, record: `f ${exec ? "x" : "-"} ${content} ${childRel}\0` });
    } else {
      throw new UnsupportedLocatorShape(opts.locator, `cannot digest special file '${childRel}'`);
    }
  }
}

export function treeListing(root: string, algo: HashAlgo, options: TreeDigestOptions = {}): string {
  const opts = { executableBit: options.executableBit ?? true, locator: options.locator ?? "" };
  const entries: TreeEntry[] = [];
  collectEntries(root, "", algo, opts, entries);

  // Sort independent of readdir order
  entries.sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0));
  return TREE_HEADER + entries.map(e => e.record).join("");
}

export function digestTree(root: string, algo: HashAlgo, options: TreeDigestOptions = {}): Buffer {
  return createHash(algo).update(treeListing(root, algo, options)).digest();
}

/**
 * Digest whatever is at `path`: flat for a file, recursive for a directory.
 */
export function digestPath(
  path: string,
  algo: HashAlgo,
  options: TreeDigestOptions = {}
): { bytes: Buffer; mode: HashMode } {
  const stat = lstatSync(path);
  if (stat.isDirectory()) {
    return { bytes: digestTree(path, algo, options), mode: "recursive" };
  }
  if (stat.isFile()) {
    return { bytes: digestFile(path, algo), mode: "flat" };
  }
  throw new UnsupportedLocatorShape(options.locator ?? "", `cannot digest ${path}: not a regular file or directory`);
}

// =============================================================================
// Expected Digests
// =============================================================================

export function isHashAlgo(value: string): value is HashAlgo {
  return (HASH_ALGOS as readonly string[]).includes(value);
}

const HEX = /^[0-9a-fA-F]+$/;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Parse a caller-declared digest. Accepts hex, Nix32, base64 and SRI
 * ("sha256-<base64>"); the SRI prefix must match `algo`.
 */
export function parseExpectedDigest(value: string, algo: HashAlgo, locator = ""): ExpectedDigest {
  const text = value.trim();
  const size = HASH_SIZES[algo];

  if (text.length === 0) {
    throw new InvalidExpectedDigest(locator, `expected ${algo} digest is empty`);
  }

  const sri = /^([a-z0-9]+)-(.+)$/.exec(text);
  if (sri) {
    const [, prefix, body] = sri;
    if (prefix !== algo) {
      throw new InvalidExpectedDigest(locator, `SRI digest '${text}' is ${prefix}, but ${algo} was declared`);
    }
    const bytes = decodeBase64(body, size);
    if (!bytes) {
      throw new InvalidExpectedDigest(locator, `invalid ${algo} SRI digest '${text}'`);
    }
    return { algo, value: text, encoding: "sri", bytes };
  }

  if (text.length === size * 2 && HEX.test(text)) {
    return { algo, value: text, encoding: "hex", bytes: Buffer.from(text, "hex") };
  }

  const nix32 = nix32Decode(text, size);
  if (nix32) {
    return { algo, value: text, encoding: "nix32", bytes: nix32 };
  }

  const base64 = decodeBase64(text, size);
  if (base64) {
    return { algo, value: text, encoding: "base64", bytes: base64 };
  }

  throw new InvalidExpectedDigest(locator, `'${text}' is not a valid ${algo} digest`);
}

function decodeBase64(text: string, size: number): Buffer | null {
  if (!BASE64.test(text) || text.length !== Math.ceil(size / 3) * 4) return null;
  const bytes = Buffer.from(text, "base64");
  return bytes.length === size ? bytes : null;
}

// =============================================================================
// Verifying
// =============================================================================

export function verify(actual: Buffer, expected: ExpectedDigest): boolean {
  return actual.length === expected.bytes.length && timingSafeEqual(actual, expected.bytes);
}

/** Render a digest in the same encoding the caller used */
export function formatLike(actual: Buffer, expected: ExpectedDigest): string {
  return encodeDigest(actual, expected.algo, expected.encoding);
}

export function formatDigest(bytes: Buffer, algo: HashAlgo, encoding: HashEncoding = "sri"): string {
  return encodeDigest(bytes, algo, encoding);
}
