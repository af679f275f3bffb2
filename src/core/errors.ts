/**
 * Failure taxonomy for fetches.
 *
 * Adapters and the normalizer classify and throw; only the builder decides
 * whether a failure is retried.
 */

export type FetchErrorKind =
  | "RetrievalFailed"
  | "LocatorNotFound"
  | "HostUnavailable"
  | "ExtractionFailed"
  | "DigestMismatch"
  | "UnsupportedLocatorShape"
  | "UnsupportedArchiveFormat"
  | "InvalidExpectedDigest"
  | "InvalidOptions"
  | "Cancelled";

const RETRYABLE: ReadonlySet<FetchErrorKind> = new Set<FetchErrorKind>([
  "RetrievalFailed",
  "LocatorNotFound",
  "HostUnavailable",
  "ExtractionFailed",
]);

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly locator: string;

  constructor(kind: FetchErrorKind, locator: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.locator = locator;
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.kind);
  }

  /** One-line report: classification, locator, message */
  describe(): string {
    return this.locator
      ? `${this.kind} (${this.locator}): ${this.message}`
      : `${this.kind}: ${this.message}`;
  }
}

export class RetrievalFailed extends FetchError {
  constructor(
    locator: string,
    message: string,
    options?: { cause?: unknown; kind?: "LocatorNotFound" | "HostUnavailable" }
  ) {
    super(options?.kind ?? "RetrievalFailed", locator, message, options);
  }
}

export class LocatorNotFound extends RetrievalFailed {
  constructor(locator: string, message: string, options?: { cause?: unknown }) {
    super(locator, message, { ...options, kind: "LocatorNotFound" });
  }
}

export class HostUnavailable extends RetrievalFailed {
  constructor(locator: string, message: string, options?: { cause?: unknown }) {
    super(locator, message, { ...options, kind: "HostUnavailable" });
  }
}

export class ExtractionFailed extends FetchError {
  constructor(locator: string, message: string, options?: { cause?: unknown }) {
    super("ExtractionFailed", locator, message, options);
  }
}

export class DigestMismatch extends FetchError {
  readonly expected: string;
  readonly actual: string;

  constructor(locator: string, name: string, expected: string, actual: string) {
    super(
      "DigestMismatch",
      locator,
      `hash mismatch in fixed-output derivation '${name}':\n  specified: ${expected}\n  got:       ${actual}`
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnsupportedLocatorShape extends FetchError {
  constructor(locator: string, message: string) {
    super("UnsupportedLocatorShape", locator, message);
  }
}

export class UnsupportedArchiveFormat extends FetchError {
  constructor(locator: string, message: string) {
    super("UnsupportedArchiveFormat", locator, message);
  }
}

export class InvalidExpectedDigest extends FetchError {
  constructor(locator: string, message: string) {
    super("InvalidExpectedDigest", locator, message);
  }
}

export class InvalidOptions extends FetchError {
  constructor(locator: string, message: string) {
    super("InvalidOptions", locator, message);
  }
}

export class Cancelled extends FetchError {
  constructor(locator: string, options?: { cause?: unknown }) {
    super("Cancelled", locator, "fetch was cancelled", options);
  }
}

export function isFetchError(err: unknown): err is FetchError {
  return err instanceof FetchError;
}
