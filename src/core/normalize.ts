/**
 * Archive normalizer
 *
 * Turns a fetch result into the shape that gets hashed:
 * - detect and extract archives with external tools
 * - collapse a single wrapper directory
 * - prune to a requested sub-path
 *
 * Wrapper rule: after extraction, when the root holds exactly one entry and
 * that entry is a real directory, its contents become the root. Applied
 * once, only when `stripRoot` is on (the default).
 */

import { closeSync, lstatSync, mkdirSync, openSync, readSync, readdirSync } from "node:fs";
import { basename, join } from "node:path";
import type { OutputShape, PostFetch } from "./types";
import { EXIT_CANNOT_EXECUTE, EXIT_COMMAND_NOT_FOUND } from "./types";
import type { ExecutionContext, InvocationResult } from "./sandbox";
import {
  Cancelled,
  ExtractionFailed,
  InvalidOptions,
  LocatorNotFound,
  UnsupportedArchiveFormat,
  UnsupportedLocatorShape,
} from "./errors";

// =============================================================================
// Format Detection
// =============================================================================

export type ArchiveFormat =
  | "tar"
  | "tar.gz"
  | "tar.bz2"
  | "tar.xz"
  | "tar.zst"
  | "zip"
  | "7z"
  | "rar";

interface Magic {
  format: ArchiveFormat;
  offset: number;
  bytes: number[];
}

const MAGICS: Magic[] = [
  { format: "zip", offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] },
  { format: "zip", offset: 0, bytes: [0x50, 0x4b, 0x05, 0x06] }, // empty zip
  { format: "tar.gz", offset: 0, bytes: [0x1f, 0x8b] },
  { format: "tar.bz2", offset: 0, bytes: [0x42, 0x5a, 0x68] },
  { format: "tar.xz", offset: 0, bytes: [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00] },
  { format: "tar.zst", offset: 0, bytes: [0x28, 0xb5, 0x2f, 0xfd] },
  { format: "7z", offset: 0, bytes: [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c] },
  { format: "rar", offset: 0, bytes: [0x52, 0x61, 0x72, 0x21, 0x1a, 0x07] },
  { format: "tar", offset: 257, bytes: [0x75, 0x73, 0x74, 0x61, 0x72] }, // "ustar"
];

const EXTENSIONS: [string, ArchiveFormat][] = [
  [".tar.gz", "tar.gz"],
  [".tgz", "tar.gz"],
  [".tar.bz2", "tar.bz2"],
  [".tbz2", "tar.bz2"],
  [".tar.xz", "tar.xz"],
  [".txz", "tar.xz"],
  [".tar.zst", "tar.zst"],
  [".tar", "tar"],
  [".zip", "zip"],
  [".7z", "7z"],
  [".rar", "rar"],
];

function readHead(path: string, length: number): Buffer {
  const fd = openSync(path, "r");
  try {
    const buf = Buffer.alloc(length);
    const read = readSync(fd, buf, 0, length, 0);
    return buf.subarray(0, read);
  } finally {
    closeSync(fd);
  }
}

/**
 * Detect an archive's format from its leading bytes, falling back to its
 * file extension. Compressed streams are assumed to hold a tarball.
 */
export function detectArchiveFormat(path: string, locator = ""): ArchiveFormat {
  const head = readHead(path, 512);
  for (const magic of MAGICS) {
    const slice = head.subarray(magic.offset, magic.offset + magic.bytes.length);
    if (slice.length === magic.bytes.length && magic.bytes.every((b, i) => slice[i] === b)) {
      return magic.format;
    }
  }

  const lower = basename(path).toLowerCase();
  for (const [ext, format] of EXTENSIONS) {
    if (lower.endsWith(ext)) return format;
  }

  throw new UnsupportedArchiveFormat(locator, `cannot determine archive format of ${basename(path)}`);
}

// =============================================================================
// Extraction Tools
// =============================================================================

export interface ToolCommand {
  builder: string;
  args: string[];
}

/** Maps a format to the command that extracts it into a directory */
export interface ArchiveTools {
  command(format: ArchiveFormat, archive: string, dest: string): ToolCommand;
}

export interface ArchiveToolPaths {
  tar: string;
  unzip: string;
  unar: string;
}

export const DEFAULT_ARCHIVE_TOOL_PATHS: ArchiveToolPaths = {
  tar: "tar",
  unzip: "unzip",
  unar: "unar",
};

export function archiveTools(paths: Partial<ArchiveToolPaths> = {}): ArchiveTools {
  const tools = { ...DEFAULT_ARCHIVE_TOOL_PATHS, ...paths };
  return {
    command(format, archive, dest) {
      switch (format) {
        case "tar":
        case "tar.gz":
        case "tar.bz2":
        case "tar.xz":
        case "tar.zst":
          // GNU tar detects the compression on its own
          return { builder: tools.tar, args: ["--no-same-owner", "-xf", archive, "-C", dest] };
        case "zip":
          return { builder: tools.unzip, args: ["-qq", archive, "-d", dest] };
        case "7z":
        case "rar":
          return { builder: tools.unar, args: ["-quiet", "-no-directory", "-output-directory", dest, archive] };
      }
    },
  };
}

// =============================================================================
// Extraction
// =============================================================================

export interface NormalizeEnv {
  context: ExecutionContext;
  tools: ArchiveTools;
  locator: string;
  signal?: AbortSignal;
}

export interface ExtractOptions {
  stripRoot?: boolean;
  /** Directory holding both the archive and `dest`; defaults to `dest` */
  workDir?: string;
}

/**
 * Extract `archive` into the fresh directory `dest` and return the
 * normalized root (the wrapper directory when collapsed, `dest` otherwise).
 */
export async function extract(
  archive: string,
  dest: string,
  env: NormalizeEnv,
  options: ExtractOptions = {}
): Promise<string> {
  const format = detectArchiveFormat(archive, env.locator);
  mkdirSync(dest, { recursive: true });

  const { builder, args } = env.tools.command(format, archive, dest);
  let result: InvocationResult;
  try {
    result = await env.context.run({
      builder,
      args,
      env: { out: dest },
      network: false,
      workDir: options.workDir ?? dest,
      signal: env.signal,
    });
  } catch (err) {
    if (env.signal?.aborted) throw new Cancelled(env.locator, { cause: err });
    throw new ExtractionFailed(env.locator, `could not run ${builder}`, { cause: err });
  }
  if (env.signal?.aborted) throw new Cancelled(env.locator);

  if (result.exitCode === EXIT_CANNOT_EXECUTE || result.exitCode === EXIT_COMMAND_NOT_FOUND) {
    throw new InvalidOptions(
      env.locator,
      `cannot execute ${builder} (exit ${result.exitCode}); check the archive tool settings`
    );
  }
  if (result.exitCode !== 0) {
    throw new ExtractionFailed(
      env.locator,
      `${builder} failed on ${format} archive (exit ${result.exitCode})${result.stderr ? `: ${result.stderr.trim()}` : ""}`
    );
  }

  const entries = readdirSync(dest);
  if (entries.length === 0) {
    throw new ExtractionFailed(env.locator, `${format} archive extracted to nothing`);
  }

  return (options.stripRoot ?? true) ? collapseWrapper(dest) : dest;
}

/**
 * Return the single wrapper directory inside `root`, or `root` itself.
 */
export function collapseWrapper(root: string): string {
  const entries = readdirSync(root);
  if (entries.length !== 1) return root;

  const only = join(root, entries[0]);
  return lstatSync(only).isDirectory() ? only : root;
}

// =============================================================================
// Sub-path Selection
// =============================================================================

export function splitSubPath(subPath: string, locator = ""): string[] {
  if (subPath.startsWith("/")) {
    throw new UnsupportedLocatorShape(locator, `sub-path must be relative: '${subPath}'`);
  }
  const segments = subPath.split("/").filter((s, i, all) => !(s === "" && i === all.length - 1));
  if (segments.length === 0 || segments.some(s => s === "" || s === "." || s === "..")) {
    throw new UnsupportedLocatorShape(locator, `invalid sub-path: '${subPath}'`);
  }
  return segments;
}

/**
 * Resolve `subPath` inside `root`. Everything outside it is left behind
 * when the result is hashed and published.
 *
 * A trailing slash selects a directory; otherwise the entry must be a
 * regular file. Symlinks are never followed, so the selection stays
 * inside `root`.
 */
export function selectSubPath(root: string, subPath: string, locator = ""): string {
  const segments = splitSubPath(subPath, locator);
  let selected = root;
  for (const [i, segment] of segments.entries()) {
    selected = join(selected, segment);
    const stat = lstatSync(selected, { throwIfNoEntry: false });
    if (!stat) {
      throw new LocatorNotFound(locator, `'${subPath}' does not exist in the fetched content`);
    }
    if (stat.isSymbolicLink()) {
      const through = segments.slice(0, i + 1).join("/");
      throw new UnsupportedLocatorShape(locator, `'${subPath}' passes through the symlink '${through}'`);
    }
  }

  const stat = lstatSync(selected);

  if (subPath.endsWith("/") && !stat.isDirectory()) {
    throw new UnsupportedLocatorShape(locator, `'${subPath}' is not a directory`);
  }
  if (!subPath.endsWith("/") && !stat.isFile()) {
    const hint = stat.isDirectory() ? `; write '${subPath}/' to select a directory` : "";
    throw new UnsupportedLocatorShape(locator, `'${subPath}' is not a regular file${hint}`);
  }
  return selected;
}

/**
 * Shape of the hashed result, known before anything is fetched.
 */
export function resultShape(fetched: OutputShape, postFetch: PostFetch): OutputShape {
  // A fetched directory is pruned first, so an unpacked result is a tree
  if (postFetch.unpack && fetched === "directory") return "directory";
  if (postFetch.subPath !== undefined) {
    return postFetch.subPath.endsWith("/") ? "directory" : "file";
  }
  return postFetch.unpack ? "directory" : fetched;
}

// =============================================================================
// Post-fetch Normalization
// =============================================================================

/**
 * Apply post-fetch steps to the fetch result at `fetched`.
 *
 * A sub-path selects inside the fetched directory when there is one,
 * otherwise inside the extracted archive. Returns the path to hash.
 */
export async function normalize(
  fetched: string,
  postFetch: PostFetch,
  workDir: string,
  env: NormalizeEnv
): Promise<string> {
  let current = fetched;
  const fetchedDir = lstatSync(fetched).isDirectory();

  if (postFetch.subPath && fetchedDir) {
    current = selectSubPath(current, postFetch.subPath, env.locator);
  }

  if (postFetch.unpack) {
    if (!lstatSync(current).isFile()) {
      throw new InvalidOptions(env.locator, "unpack needs a single archive file; select one with a sub-path");
    }
    current = await extract(current, join(workDir, "unpacked"), env, {
      stripRoot: postFetch.stripRoot,
      workDir,
    });

    if (postFetch.subPath && !fetchedDir) {
      current = selectSubPath(current, postFetch.subPath, env.locator);
    }
  } else if (postFetch.subPath && !fetchedDir) {
    throw new UnsupportedLocatorShape(env.locator, "a single file has no sub-entries; unpack it to select inside");
  }

  return current;
}
