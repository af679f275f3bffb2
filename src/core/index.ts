/**
 * hostfetch core exports
 */

// Types
export type {
  StorePath,
  Hash,
  Nix32Hash,
  HashAlgo,
  HashEncoding,
  HashMode,
  ExpectedDigest,
  OutputShape,
  RetrievalProcedure,
  PostFetch,
  FixedOutputDerivation,
  Artifact,
  StoreConfig,
} from "./types";

export {
  HASH_ALGOS,
  HASH_SIZES,
  DEFAULT_STORE_DIR,
  EXIT_NOT_FOUND,
  EXIT_HOST_UNAVAILABLE,
  EXIT_CANNOT_EXECUTE,
  EXIT_COMMAND_NOT_FOUND,
  validateArtifactName,
} from "./types";

// Errors
export type { FetchErrorKind } from "./errors";
export {
  FetchError,
  RetrievalFailed,
  LocatorNotFound,
  HostUnavailable,
  ExtractionFailed,
  DigestMismatch,
  UnsupportedLocatorShape,
  UnsupportedArchiveFormat,
  InvalidExpectedDigest,
  InvalidOptions,
  Cancelled,
  isFetchError,
} from "./errors";

// Hashing
export {
  hashBytes,
  sha256,
  sha256Hex,
  sha256Truncated,
  nix32Encode,
  nix32Decode,
  encodeDigest,
  toSRI,
  computeStorePath,
  computeFixedOutputPath,
} from "./hash";

// Digest verification
export type { TreeDigestOptions } from "./digest";
export {
  digestFile,
  digestTree,
  digestPath,
  treeListing,
  parseExpectedDigest,
  verify,
  formatDigest,
  formatLike,
  isHashAlgo,
} from "./digest";

// Store
export { Store } from "./store";

// Execution contexts
export type { ExecutionContext, Invocation, InvocationResult, DockerContextConfig } from "./sandbox";
export { DirectContext, DockerContext } from "./sandbox";

// Normalization
export type { ArchiveFormat, ArchiveTools, ArchiveToolPaths, ToolCommand, NormalizeEnv } from "./normalize";
export {
  detectArchiveFormat,
  archiveTools,
  DEFAULT_ARCHIVE_TOOL_PATHS,
  extract,
  collapseWrapper,
  selectSubPath,
  splitSubPath,
  resultShape,
  normalize,
} from "./normalize";

// Building
export type { BuildConfig, BuildDeps } from "./build";
export { realize, DEFAULT_BUILD_CONFIG } from "./build";

// Logging and configuration
export type { Logger, LogLevel, LogEntry, LogHandler } from "./logger";
export { logger, createLogger, setLogHandler, resetLogHandler, setLogLevel, formatEntry } from "./logger";
export type { Config } from "./config";
export { loadConfig } from "./config";
