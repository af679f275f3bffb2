/**
 * The hostfetch Store
 *
 * Content-addressed, immutable storage for verified artifacts. Work in
 * progress lives in private scratch directories inside the store directory,
 * so publishing is a single rename on the same filesystem.
 */

import {
  chmodSync,
  existsSync,
  lstatSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  renameSync,
  rmSync,
} from "node:fs";
import { join } from "node:path";
import type { StorePath, StoreConfig } from "./types";
import { DEFAULT_STORE_DIR } from "./types";

const SCRATCH_PREFIX = ".tmp-";

export class Store {
  readonly dir: string;

  constructor(config: Partial<StoreConfig> = {}) {
    this.dir = config.storeDir ?? DEFAULT_STORE_DIR;
    this.ensureDir();
  }

  private ensureDir(): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true, mode: 0o755 });
    }
  }

  // ===========================================================================
  // Query
  // ===========================================================================

  /** Check if a path exists in the store */
  has(path: StorePath): boolean {
    return existsSync(path);
  }

  /** Get all published store paths (scratch directories excluded) */
  list(): StorePath[] {
    return readdirSync(this.dir)
      .filter(name => !name.startsWith(SCRATCH_PREFIX))
      .sort()
      .map(name => join(this.dir, name) as StorePath);
  }

  // ===========================================================================
  // Scratch Space
  // ===========================================================================

  /**
   * Create a scratch directory exclusive to one fetch attempt.
   */
  createScratch(): string {
    return mkdtempSync(join(this.dir, SCRATCH_PREFIX));
  }

  /** Remove a scratch directory or an unpublished output, whatever its permissions */
  discard(path: string): void {
    if (!existsSync(path)) return;
    this.makeWritable(path);
    rmSync(path, { recursive: true, force: true });
  }

  // ===========================================================================
  // Publishing
  // ===========================================================================

  /**
   * Atomically move a verified output to its store path.
   *
   * 1. Make read-only (executable bits kept)
   * 2. Rename to final path (atomic on POSIX)
   *
   * Returns false when the path was already present; the new copy is discarded.
   */
  publish(tempPath: string, storePath: StorePath): boolean {
    if (this.has(storePath)) {
      this.discard(tempPath);
      return false;
    }

    this.makeImmutable(tempPath);

    try {
      renameSync(tempPath, storePath);
    } catch (err) {
      // Lost a race with an identical publish
      if (this.has(storePath)) {
        this.discard(tempPath);
        return false;
      }
      throw err;
    }
    return true;
  }

  private makeImmutable(path: string): void {
    const stat = lstatSync(path);
    if (stat.isSymbolicLink()) return;
    if (stat.isDirectory()) {
      for (const entry of readdirSync(path)) {
        this.makeImmutable(join(path, entry));
      }
      chmodSync(path, 0o555); // r-xr-xr-x for dirs
    } else {
      // r-xr-xr-x for executables, r--r--r-- for everything else
      chmodSync(path, stat.mode & 0o100 ? 0o555 : 0o444);
    }
  }

  private makeWritable(path: string): void {
    const stat = lstatSync(path);
    if (stat.isSymbolicLink()) return;
    if (stat.isDirectory()) {
      chmodSync(path, 0o755);
      for (const entry of readdirSync(path)) {
        this.makeWritable(join(path, entry));
      }
    }
  }
}
