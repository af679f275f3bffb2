/**
 * hostfetch User API
 *
 * High-level API for declaring and running hash-verified fetches.
 * This is what users import and use.
 */

import { basename } from "node:path";
import { z } from "zod";
import type {
  Artifact,
  FixedOutputDerivation,
  HashAlgo,
  OutputShape,
  PostFetch,
  StorePath,
} from "./core";
import {
  Store,
  realize,
  DEFAULT_BUILD_CONFIG,
  computeFixedOutputPath,
  parseExpectedDigest,
  validateArtifactName,
  resultShape,
  archiveTools,
  loadConfig,
  setLogLevel,
  DirectContext,
  DockerContext,
  InvalidOptions,
  UnsupportedLocatorShape,
} from "./core";
import type { Config, ExecutionContext, ArchiveTools } from "./core";
import { resolveLocator, type HostKind, type HostTools } from "./hosts";

// =============================================================================
// Global Defaults (lazy initialized)
// =============================================================================

let globalConfig: Config | null = null;
let globalStore: Store | null = null;

export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = loadConfig(process.env);
    setLogLevel(globalConfig.logLevel);
  }
  return globalConfig;
}

export function getStore(): Store {
  if (!globalStore) {
    globalStore = new Store({ storeDir: getConfig().storeDir });
  }
  return globalStore;
}

export function defaultContext(config: Config = getConfig()): ExecutionContext {
  if (config.sandbox === "none") return new DirectContext();
  if (!config.dockerImage) {
    throw new Error("HOSTFETCH_DOCKER_IMAGE is required when HOSTFETCH_SANDBOX is docker");
  }
  return new DockerContext({ image: config.dockerImage });
}

function hostTools(config: Config): HostTools {
  const { curl, jq, megadl } = config.tools;
  return { curl, jq, megadl };
}

function defaultArchiveTools(config: Config): ArchiveTools {
  const { tar, unzip, unar } = config.tools;
  return archiveTools({ tar, unzip, unar });
}

// =============================================================================
// Options
// =============================================================================

const FetchOptionsSchema = z.object({
  retries: z.number().int().nonnegative().optional(),
  backoffMs: z.number().nonnegative().optional(),
  renameTo: z.string().min(1).optional(),
  subPath: z.string().min(1).optional(),
  unpack: z.boolean().optional(),
  stripRoot: z.boolean().optional(),
  executableBit: z.boolean().optional(),
});

export interface FetchOptions {
  /** Extra attempts for retryable failures (default from HOSTFETCH_RETRIES) */
  retries?: number;
  backoffMs?: number;
  /** Artifact name; defaults to the sub-path's last segment, else "source" */
  renameTo?: string;
  /** Entry to keep; a trailing slash selects a directory */
  subPath?: string;
  /** Extract the fetched archive */
  unpack?: boolean;
  /** Collapse a single top-level directory after extraction (default true) */
  stripRoot?: boolean;
  /** Whether the executable bit is part of tree digests (default true) */
  executableBit?: boolean;
  signal?: AbortSignal;
  store?: Store;
  context?: ExecutionContext;
  tools?: ArchiveTools;
  hostTools?: HostTools;
}

function checkOptions(options: FetchOptions, locator: string): void {
  const parsed = FetchOptionsSchema.safeParse({
    retries: options.retries,
    backoffMs: options.backoffMs,
    renameTo: options.renameTo,
    subPath: options.subPath,
    unpack: options.unpack,
    stripRoot: options.stripRoot,
    executableBit: options.executableBit,
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new InvalidOptions(locator, problems);
  }
}

function defaultName(subPath: string | undefined): string {
  if (!subPath) return "source";
  return basename(subPath.replace(/\/+$/, "")) || "source";
}

// =============================================================================
// Derivation Builders
// =============================================================================

/**
 * Create a fixed-output derivation from any retrieval command.
 * Its output is accepted only if it hashes to `hash`.
 */
export function mkFOD(options: {
  name: string;
  builder: string;
  args?: string[];
  env?: Record<string, string>;
  hash: string;
  algo?: HashAlgo;
  /** What the command leaves at $out (default "file") */
  shape?: OutputShape;
  network?: boolean;
  postFetch?: PostFetch;
}): FixedOutputDerivation {
  const locator = `${options.builder} ${(options.args ?? []).join(" ")}`.trim();
  validateArtifactName(options.name, locator);
  return {
    name: options.name,
    locator,
    procedure: {
      builder: options.builder,
      args: options.args ?? [],
      env: options.env ?? {},
      network: options.network ?? true,
    },
    outputShape: options.shape ?? "file",
    outputHash: parseExpectedDigest(options.hash, options.algo ?? "sha256", locator),
    postFetch: options.postFetch,
  };
}

/**
 * Mark a derivation's fetched archive for extraction before hashing.
 */
export function mkUnpack(drv: FixedOutputDerivation, options: { stripRoot?: boolean } = {}): FixedOutputDerivation {
  return {
    ...drv,
    postFetch: { ...drv.postFetch, unpack: true, stripRoot: options.stripRoot ?? drv.postFetch?.stripRoot },
  };
}

/**
 * Translate a host locator into a fixed-output derivation.
 */
export function fromHost(
  kind: HostKind,
  locator: unknown,
  hash: string,
  algo: HashAlgo = "sha256",
  options: FetchOptions = {}
): FixedOutputDerivation {
  const tools = options.hostTools ?? hostTools(getConfig());
  const resolution = resolveLocator(kind, locator, { subPath: options.subPath }, tools);
  checkOptions(options, resolution.locator);

  if (resolution.shape === "file" && resolution.prune !== undefined && !options.unpack) {
    throw new UnsupportedLocatorShape(
      resolution.locator,
      "this locator names a single file; sub-paths select inside it only with unpack"
    );
  }

  const name = options.renameTo ?? defaultName(options.subPath);
  validateArtifactName(name, resolution.locator);

  return {
    name,
    locator: resolution.locator,
    procedure: resolution.procedure,
    outputShape: resolution.shape,
    outputHash: parseExpectedDigest(hash, algo, resolution.locator),
    postFetch: {
      unpack: options.unpack,
      stripRoot: options.stripRoot,
      subPath: resolution.prune,
    },
  };
}

interface HostFetchArgs {
  hash: string;
  algo?: HashAlgo;
  name?: string;
  subPath?: string;
  unpack?: boolean;
  stripRoot?: boolean;
}

function hostOptions(args: HostFetchArgs): FetchOptions {
  return { renameTo: args.name, subPath: args.subPath, unpack: args.unpack, stripRoot: args.stripRoot };
}

/** Fetch a Mega file or folder share link */
export function fetchFromMega(args: HostFetchArgs & { url: string }): FixedOutputDerivation {
  return fromHost("mega", { url: args.url }, args.hash, args.algo, hostOptions(args));
}

/** Fetch a Gofile folder, or one entry of it */
export function fetchFromGofile(args: HostFetchArgs & ({ url: string } | { id: string })): FixedOutputDerivation {
  const locator = "url" in args ? { url: args.url } : { id: args.id };
  return fromHost("gofile", locator, args.hash, args.algo, hostOptions(args));
}

/** Fetch a Buzzheavier file */
export function fetchFromBuzzheavier(args: HostFetchArgs & ({ url: string } | { id: string })): FixedOutputDerivation {
  const locator = "url" in args ? { url: args.url } : { id: args.id };
  return fromHost("buzzheavier", locator, args.hash, args.algo, hostOptions(args));
}

// =============================================================================
// Build API
// =============================================================================

/**
 * Fetch and verify a derivation. Returns the published artifact.
 */
export async function build(drv: FixedOutputDerivation, options: FetchOptions = {}): Promise<Artifact> {
  const config = getConfig();
  return realize(
    drv,
    {
      store: options.store ?? getStore(),
      context: options.context ?? defaultContext(config),
      tools: options.tools ?? defaultArchiveTools(config),
    },
    {
      retries: options.retries ?? config.retries,
      backoffMs: options.backoffMs ?? config.backoffMs,
      executableBit: options.executableBit ?? DEFAULT_BUILD_CONFIG.executableBit,
      signal: options.signal,
    }
  );
}

/**
 * fetch(hostKind, locator, expectedDigest, algorithm, options)
 */
export async function fetch(
  kind: HostKind,
  locator: unknown,
  expectedDigest: string,
  algorithm: HashAlgo = "sha256",
  options: FetchOptions = {}
): Promise<Artifact> {
  return build(fromHost(kind, locator, expectedDigest, algorithm, options), options);
}

/**
 * The address a derivation's artifact will have, without fetching.
 */
export function outPath(drv: FixedOutputDerivation, store: Store = getStore()): StorePath {
  const shape = resultShape(drv.outputShape, drv.postFetch ?? {});
  return computeFixedOutputPath(
    drv.outputHash.algo,
    drv.outputHash.bytes,
    shape === "directory" ? "recursive" : "flat",
    store.dir
  );
}

/**
 * Print a derivation as JSON.
 */
export function show(drv: FixedOutputDerivation): void {
  const { outputHash, ...rest } = drv;
  console.log(JSON.stringify({ ...rest, outputHash: { algo: outputHash.algo, value: outputHash.value } }, null, 2));
}

export { Store, realize } from "./core";
export type { Artifact, FixedOutputDerivation, StorePath } from "./core";
