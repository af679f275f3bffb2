/**
 * hostfetch - hash-verified fetches from file-hosting services
 *
 * @packageDocumentation
 *
 * @example
 * ```ts
 * import { fetch } from 'hostfetch';
 *
 * const artifact = await fetch(
 *   'gofile',
 *   'https://gofile.io/d/AbC123',
 *   'sha256-47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=',
 *   'sha256',
 *   { subPath: 'notes.txt', retries: 2 },
 * );
 * console.log(artifact.path);
 * ```
 */

// Re-export the user-facing API
export {
  /** Fetch from a host and verify against a declared digest */
  fetch,
  /** Fetch and verify a fixed-output derivation */
  build,
  /** Get the artifact address without fetching */
  outPath,
  /** Print the derivation JSON */
  show,

  /** Create a fixed-output derivation from a host locator */
  fromHost,
  /** Create a fixed-output derivation from any command */
  mkFOD,
  /** Extract a derivation's archive before hashing */
  mkUnpack,
  fetchFromMega,
  fetchFromGofile,
  fetchFromBuzzheavier,

  /** Get the global store instance */
  getStore,
  /** Get the configuration read from the environment */
  getConfig,
  /** The Store class for advanced usage */
  Store,
  /** Lower-level: run the builder with explicit dependencies */
  realize,
} from "./api";

export type { FetchOptions } from "./api";

export {
  FetchError,
  DigestMismatch,
  RetrievalFailed,
  isFetchError,
  digestPath,
  parseExpectedDigest,
  DirectContext,
  DockerContext,
  archiveTools,
} from "./core";

// Re-export types
export type {
  Artifact,
  FixedOutputDerivation,
  StorePath,
  HashAlgo,
  OutputShape,
  FetchErrorKind,
  ExecutionContext,
  Invocation,
  InvocationResult,
  ArchiveTools,
} from "./core";

export type { HostKind, HostTools, LocatorInput } from "./hosts";
export { HOST_KINDS } from "./hosts";
