#!/usr/bin/env node
/**
 * hostfetch CLI
 *
 * Usage:
 *   hostfetch fetch <host> <locator> <hash> [options]   Fetch, verify, print artifact path
 *   hostfetch path <host> <locator> <hash> [options]    Print the artifact path without fetching
 *   hostfetch show <host> <locator> <hash> [options]    Print the derivation
 *   hostfetch hash <path> [--algo A] [--no-exec-bit]    Print the digest of a local file or tree
 *   hostfetch list                                      Print every published artifact path
 */

import { resolve } from "node:path";
import { build, fromHost, outPath, show, getConfig, getStore } from "./api";
import type { FetchOptions } from "./api";
import { digestPath, formatDigest, isHashAlgo, isFetchError, setLogLevel } from "./core";
import type { HashAlgo } from "./core";
import { isHostKind, HOST_KINDS } from "./hosts";

const USAGE = `
hostfetch - hash-verified fetches from file-hosting services

Usage:
  hostfetch fetch <host> <locator> <hash> [options]   Fetch, verify, print artifact path
  hostfetch path <host> <locator> <hash> [options]    Print the artifact path without fetching
  hostfetch show <host> <locator> <hash> [options]    Print the derivation
  hostfetch hash <path> [--algo A] [--no-exec-bit]    Print the digest of a local file or tree
  hostfetch list                                      Print every published artifact path

Hosts: ${HOST_KINDS.join(", ")}

Options:
  --algo <sha256|sha512|sha1>   Digest algorithm (default sha256)
  --retries <n>                 Extra attempts for retryable failures
  --name <name>                 Artifact name
  --sub-path <path>             Entry to keep; a trailing slash selects a directory
  --unpack                      Extract the fetched archive
  --no-strip-root               Keep a single top-level directory after extraction
  --no-exec-bit                 Leave the executable bit out of tree digests
  --verbose                     Debug logging

Examples:
  hostfetch fetch gofile https://gofile.io/d/AbC123 sha256-... --sub-path notes.txt
  hostfetch fetch mega 'https://mega.nz/folder/XyZ#key' sha256-... --retries 2
  hostfetch hash ./downloaded
`;

class UsageError extends Error {}

const VALUE_FLAGS = new Set(["--algo", "--retries", "--name", "--sub-path"]);
const BOOL_FLAGS = new Set(["--unpack", "--no-strip-root", "--no-exec-bit", "--verbose"]);

interface ParsedArgs {
  positional: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], values: new Map(), switches: new Set() };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[++i];
      if (value === undefined) throw new UsageError(`${arg} needs a value`);
      parsed.values.set(arg, value);
    } else if (BOOL_FLAGS.has(arg)) {
      parsed.switches.add(arg);
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      parsed.positional.push(arg);
    }
  }
  return parsed;
}

function algoOf(args: ParsedArgs): HashAlgo {
  const algo = args.values.get("--algo") ?? "sha256";
  if (!isHashAlgo(algo)) throw new UsageError(`Unsupported algorithm: ${algo}`);
  return algo;
}

function fetchOptions(args: ParsedArgs): FetchOptions {
  const retries = args.values.get("--retries");
  if (retries !== undefined && !/^\d+$/.test(retries)) {
    throw new UsageError(`--retries must be a non-negative integer`);
  }
  return {
    retries: retries === undefined ? undefined : Number(retries),
    renameTo: args.values.get("--name"),
    subPath: args.values.get("--sub-path"),
    unpack: args.switches.has("--unpack") || undefined,
    stripRoot: args.switches.has("--no-strip-root") ? false : undefined,
    executableBit: args.switches.has("--no-exec-bit") ? false : undefined,
  };
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv;

  if (!command || command === "help" || command === "--help") {
    console.log(USAGE);
    return;
  }

  const args = parseArgs(rest);
  getConfig();
  if (args.switches.has("--verbose")) setLogLevel("debug");

  if (command === "list") {
    for (const path of getStore().list()) console.log(path);
    return;
  }

  if (command === "hash") {
    const [path] = args.positional;
    if (!path) throw new UsageError("No path specified");
    const algo = algoOf(args);
    const { bytes } = digestPath(resolve(path), algo, {
      executableBit: !args.switches.has("--no-exec-bit"),
    });
    console.log(formatDigest(bytes, algo));
    return;
  }

  const [host, locator, hash] = args.positional;
  if (!host || !locator || !hash) {
    throw new UsageError(`${command} needs <host> <locator> <hash>`);
  }
  if (!isHostKind(host)) {
    throw new UsageError(`Unknown host: ${host} (expected one of ${HOST_KINDS.join(", ")})`);
  }

  const options = fetchOptions(args);
  const drv = fromHost(host, locator, hash, algoOf(args), options);

  switch (command) {
    case "fetch": {
      const artifact = await build(drv, options);
      console.log(artifact.path);
      break;
    }

    case "path":
      console.log(outPath(drv));
      break;

    case "show":
      show(drv);
      break;

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}\n${USAGE}`);
    process.exit(2);
  }
  if (isFetchError(err)) {
    console.error(`error: ${err.describe()}`);
  } else {
    console.error("Error:", err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
