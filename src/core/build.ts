/**
 * Fixed-output fetch builder for hostfetch
 *
 * Implements:
 * - Running a retrieval procedure in an execution context
 * - Post-fetch normalization and hash verification
 * - Atomic publishing of verified output
 * - Bounded, caller-visible retries
 */

import { lstatSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { Artifact, FixedOutputDerivation } from "./types";
import {
  EXIT_CANNOT_EXECUTE,
  EXIT_COMMAND_NOT_FOUND,
  EXIT_HOST_UNAVAILABLE,
  EXIT_NOT_FOUND,
} from "./types";
import { Store } from "./store";
import type { ExecutionContext, InvocationResult } from "./sandbox";
import { normalize, type ArchiveTools } from "./normalize";
import { digestPath, formatLike, verify } from "./digest";
import { computeFixedOutputPath, toSRI } from "./hash";
import {
  Cancelled,
  DigestMismatch,
  FetchError,
  HostUnavailable,
  InvalidOptions,
  LocatorNotFound,
  RetrievalFailed,
} from "./errors";
import { logger as rootLogger, type Logger } from "./logger";

// =============================================================================
// Build Configuration
// =============================================================================

export interface BuildConfig {
  /** Extra attempts after the first, for retryable failures only */
  retries: number;
  /** Wait before the first retry */
  backoffMs: number;
  /** Multiplier applied to the wait after each retry */
  backoffFactor: number;
  /** Whether the owner-executable bit is part of tree digests */
  executableBit: boolean;
  signal?: AbortSignal;
}

export const DEFAULT_BUILD_CONFIG: BuildConfig = {
  retries: 0,
  backoffMs: 1000,
  backoffFactor: 2,
  executableBit: true,
};

export interface BuildDeps {
  store: Store;
  context: ExecutionContext;
  tools: ArchiveTools;
  log?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

// =============================================================================
// Build Execution
// =============================================================================

/**
 * Fetch, normalize and verify a fixed-output derivation, then publish it.
 * Throws a FetchError describing why nothing was published.
 */
export async function realize(
  drv: FixedOutputDerivation,
  deps: BuildDeps,
  config: Partial<BuildConfig> = {}
): Promise<Artifact> {
  const opts: BuildConfig = { ...DEFAULT_BUILD_CONFIG, ...config };
  const log = (deps.log ?? rootLogger).child({ name: drv.name });
  const sleep = deps.sleep ?? defaultSleep;
  const attempts = opts.retries + 1;

  for (let n = 1; ; n++) {
    if (opts.signal?.aborted) throw new Cancelled(drv.locator);

    log.info(`Fetching: ${drv.locator}`, attempts > 1 ? { attempt: `${n}/${attempts}` } : {});
    try {
      return await attempt(drv, deps, opts, log);
    } catch (caught) {
      const err = classify(drv, caught, opts.signal);
      if (!err.retryable || n >= attempts) {
        log.error(err.describe());
        throw err;
      }

      const wait = opts.backoffMs * opts.backoffFactor ** (n - 1);
      log.warn(`Attempt ${n} failed, retrying`, { kind: err.kind, wait_ms: wait });
      try {
        await sleep(wait, opts.signal);
      } catch (sleepErr) {
        throw new Cancelled(drv.locator, { cause: sleepErr });
      }
    }
  }
}

async function attempt(
  drv: FixedOutputDerivation,
  deps: BuildDeps,
  opts: BuildConfig,
  log: Logger
): Promise<Artifact> {
  const { store } = deps;
  const scratch = store.createScratch();

  try {
    const out = join(scratch, "out");
    const tmp = join(scratch, "tmp");
    mkdirSync(tmp);

    let result: InvocationResult;
    try {
      result = await deps.context.run({
        builder: drv.procedure.builder,
        args: drv.procedure.args,
        env: {
          ...drv.procedure.env,
          out,
          name: drv.name,
          TMPDIR: tmp,
          TEMPDIR: tmp,
          TMP: tmp,
          TEMP: tmp,
        },
        network: drv.procedure.network,
        workDir: scratch,
        signal: opts.signal,
      });
    } catch (err) {
      if (opts.signal?.aborted) throw new Cancelled(drv.locator, { cause: err });
      throw new RetrievalFailed(drv.locator, `could not run ${drv.procedure.builder}`, { cause: err });
    }
    if (opts.signal?.aborted) throw new Cancelled(drv.locator);

    if (result.exitCode !== 0) {
      throw classifyExit(drv, result);
    }
    if (!result.producedPath) {
      throw new RetrievalFailed(drv.locator, `${drv.procedure.builder} succeeded but did not produce $out`);
    }
    checkShape(drv, result.producedPath);

    const final = await normalize(result.producedPath, drv.postFetch ?? {}, scratch, {
      context: deps.context,
      tools: deps.tools,
      locator: drv.locator,
      signal: opts.signal,
    });

    // Extraction may finish after an abort; nothing is published then
    if (opts.signal?.aborted) throw new Cancelled(drv.locator);

    const { bytes, mode } = digestPath(final, drv.outputHash.algo, {
      executableBit: opts.executableBit,
      locator: drv.locator,
    });
    if (!verify(bytes, drv.outputHash)) {
      throw new DigestMismatch(drv.locator, drv.name, drv.outputHash.value, formatLike(bytes, drv.outputHash));
    }

    const path = computeFixedOutputPath(drv.outputHash.algo, bytes, mode, store.dir);
    if (store.publish(final, path)) {
      log.info(`Built: ${path}`);
    } else {
      log.info(`Already present: ${path}`);
    }

    return { path, name: drv.name, mode, algo: drv.outputHash.algo, hash: toSRI(bytes, drv.outputHash.algo) };
  } finally {
    store.discard(scratch);
  }
}

/** Every failure leaves realize as a FetchError */
function classify(drv: FixedOutputDerivation, err: unknown, signal?: AbortSignal): FetchError {
  if (err instanceof FetchError) return err;
  if (signal?.aborted) return new Cancelled(drv.locator, { cause: err });
  const message = err instanceof Error ? err.message : String(err);
  return new RetrievalFailed(drv.locator, message, { cause: err });
}

function classifyExit(drv: FixedOutputDerivation, result: InvocationResult): FetchError {
  const detail = result.stderr.trim();
  const message = `${drv.procedure.builder} exited with code ${result.exitCode}${detail ? `\n${detail}` : ""}`;
  switch (result.exitCode) {
    case EXIT_NOT_FOUND:
      return new LocatorNotFound(drv.locator, message);
    case EXIT_HOST_UNAVAILABLE:
      return new HostUnavailable(drv.locator, message);
    case EXIT_CANNOT_EXECUTE:
    case EXIT_COMMAND_NOT_FOUND:
      return new InvalidOptions(drv.locator, `${message}\ncannot execute a retrieval tool; check the tool settings`);
    default:
      return new RetrievalFailed(drv.locator, message);
  }
}

function checkShape(drv: FixedOutputDerivation, produced: string): void {
  const stat = lstatSync(produced);
  const ok = drv.outputShape === "file" ? stat.isFile() : stat.isDirectory();
  if (!ok) {
    throw new RetrievalFailed(
      drv.locator,
      `expected a ${drv.outputShape} at $out, got ${stat.isDirectory() ? "a directory" : "something else"}`
    );
  }
}
