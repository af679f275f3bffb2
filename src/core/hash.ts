/**
 * Hashing utilities for hostfetch
 *
 * Implements:
 * - SHA hashing for every supported algorithm
 * - Nix32 encoding (Nix's custom base32), both directions
 * - Digest encodings (hex, nix32, base64, SRI)
 * - Store path computation
 */

import { createHash } from "node:crypto";
import type { Hash, HashAlgo, HashEncoding, HashMode, Nix32Hash, StorePath } from "./types";

// =============================================================================
// Nix32 Encoding
// =============================================================================

/**
 * Nix's custom base32 alphabet (omits e, o, u, t to avoid confusion)
 */
const NIX32_ALPHABET = "0123456789abcdfghijklmnpqrsvwxyz";

/**
 * Encode bytes to Nix32 format.
 *
 * Nix's base32 is unusual: bits are taken LSB-first from the start of the
 * digest, and the resulting characters are written last-to-first.
 */
export function nix32Encode(bytes: Buffer): Nix32Hash {
  if (bytes.length === 0) return "" as Nix32Hash;

  const len = Math.ceil((bytes.length * 8) / 5);
  const chars: string[] = new Array(len);

  for (let n = 0; n < len; n++) {
    const b = n * 5;
    const i = Math.floor(b / 8);
    const j = b % 8;

    // Extract 5 bits, handling byte boundary
    let c = (bytes[i] >> j) & 0x1f;
    if (i + 1 < bytes.length && j > 3) {
      c |= (bytes[i + 1] << (8 - j)) & 0x1f;
    }

    chars[len - 1 - n] = NIX32_ALPHABET[c];
  }

  return chars.join("") as Nix32Hash;
}

/**
 * Decode a Nix32 string into `size` bytes.
 * Returns null when the string is not valid Nix32 for that size.
 */
export function nix32Decode(text: string, size: number): Buffer | null {
  if (text.length !== Math.ceil((size * 8) / 5)) return null;

  const out = Buffer.alloc(size);
  for (let n = 0; n < text.length; n++) {
    const digit = NIX32_ALPHABET.indexOf(text[text.length - 1 - n]);
    if (digit < 0) return null;

    const b = n * 5;
    const i = Math.floor(b / 8);
    const j = b % 8;
    out[i] |= (digit << j) & 0xff;

    const carry = digit >> (8 - j);
    if (i + 1 < size) {
      out[i + 1] |= carry;
    } else if (carry !== 0) {
      return null;
    }
  }
  return out;
}

// =============================================================================
// Hashing
// =============================================================================

export function hashBytes(algo: HashAlgo, data: string | Buffer): Buffer {
  return createHash(algo).update(data).digest();
}

export function sha256(data: string | Buffer): Buffer {
  return hashBytes("sha256", data);
}

export function sha256Hex(data: string | Buffer): Hash {
  return sha256(data).toString("hex") as Hash;
}

/**
 * Hash and truncate to 160 bits (20 bytes), then Nix32 encode.
 * This is how store path digests are computed.
 */
export function sha256Truncated(data: string | Buffer): Nix32Hash {
  const fullHash = sha256(data);
  const truncated = fullHash.subarray(0, 20);
  return nix32Encode(truncated);
}

// =============================================================================
// Digest Encodings
// =============================================================================

export function encodeDigest(bytes: Buffer, algo: HashAlgo, encoding: HashEncoding): string {
  switch (encoding) {
    case "hex":
      return bytes.toString("hex");
    case "nix32":
      return nix32Encode(bytes);
    case "base64":
      return bytes.toString("base64");
    case "sri":
      return `${algo}-${bytes.toString("base64")}`;
  }
}

/** Canonical form used for artifacts and reports */
export function toSRI(bytes: Buffer, algo: HashAlgo): string {
  return encodeDigest(bytes, algo, "sri");
}

// =============================================================================
// Store Path Computation
// =============================================================================

/**
 * Compute a store path from a fingerprint.
 *
 * Formula: storeDir + "/" + nix32(sha256(fingerprint)[0:20]), followed by
 * "-" + name when a name is given
 *
 * @param type - The type prefix (e.g., "output:out")
 * @param innerDigest - The hex-encoded SHA256 of the inner fingerprint
 */
export function computeStorePath(
  type: string,
  innerDigest: Hash,
  storeDir: string,
  name?: string
): StorePath {
  // fingerprint = type ":sha256:" innerDigest ":" storeDir [":" name]
  const fingerprint = `${type}:sha256:${innerDigest}:${storeDir}${name === undefined ? "" : `:${name}`}`;
  const digest = sha256Truncated(fingerprint);
  return (name === undefined ? `${storeDir}/${digest}` : `${storeDir}/${digest}-${name}`) as StorePath;
}

/**
 * Compute the address of a fixed-output artifact from its algorithm, hash
 * mode and digest. Neither the artifact name nor where the content came
 * from is part of it.
 */
export function computeFixedOutputPath(
  algo: HashAlgo,
  contentHash: Buffer,
  hashMode: HashMode,
  storeDir: string
): StorePath {
  // Inner fingerprint for fixed-output: "fixed:out:" + mode + algo + ":" + hash + ":"
  const modePrefix = hashMode === "recursive" ? "r:" : "";
  const innerFingerprint = `fixed:out:${modePrefix}${algo}:${contentHash.toString("hex")}:`;
  const innerDigest = sha256Hex(innerFingerprint);
  return computeStorePath("output:out", innerDigest, storeDir);
}
