/**
 * Host adapter contract
 */

import { z } from "zod";
import type { OutputShape, RetrievalProcedure } from "../core/types";
import { EXIT_COMMAND_NOT_FOUND } from "../core/types";
import { UnsupportedLocatorShape } from "../core/errors";

export type HostKind = "mega" | "gofile" | "buzzheavier";

export const HOST_KINDS: readonly HostKind[] = ["mega", "gofile", "buzzheavier"];

export function isHostKind(value: string): value is HostKind {
  return (HOST_KINDS as readonly string[]).includes(value);
}

/** Binaries the retrieval scripts call */
export interface HostTools {
  curl: string;
  jq: string;
  megadl: string;
}

export const DEFAULT_HOST_TOOLS: HostTools = {
  curl: "curl",
  jq: "jq",
  megadl: "megadl",
};

export interface ResolveRequest {
  /** Entry to keep out of a multi-entry resource */
  subPath?: string;
}

export interface Resolution {
  /** Canonical, human-readable locator */
  locator: string;
  procedure: RetrievalProcedure;
  /** What the procedure leaves at $out */
  shape: OutputShape;
  /** Part of `subPath` the host could not select; pruned before hashing */
  prune?: string;
}

export interface HostAdapter {
  readonly kind: HostKind;
  /** Throws UnsupportedLocatorShape for malformed locators */
  resolve(locator: unknown, request: ResolveRequest, tools: HostTools): Resolution;
}

// =============================================================================
// Locator Input
// =============================================================================

const LocatorInput = z.union([
  z.string().trim().min(1),
  z.object({ url: z.string().trim().min(1) }).strict(),
  z.object({ id: z.string().trim().min(1) }).strict(),
]);

export type LocatorInput = z.input<typeof LocatorInput>;

/**
 * Read a locator given as a bare string, `{ url }` or `{ id }`.
 * Bare strings that look like URLs count as URLs.
 */
export function readLocator(kind: HostKind, input: unknown): { url: string } | { id: string } {
  const parsed = LocatorInput.safeParse(input);
  if (!parsed.success) {
    throw new UnsupportedLocatorShape(
      describeInput(input),
      `${kind} locator must be a URL, an id, { url } or { id }`
    );
  }

  const value = parsed.data;
  if (typeof value === "string") {
    return /^https?:\/\//i.test(value) ? { url: value } : { id: value };
  }
  return value;
}

export function describeInput(input: unknown): string {
  if (typeof input === "string") return input;
  try {
    return JSON.stringify(input) ?? String(input);
  } catch {
    return String(input);
  }
}

/** Join script lines; scripts read their parameters from the environment */
export function script(lines: string[]): string {
  return lines.join("\n") + "\n";
}

/** Script line that exits 127 unless the tools named by these variables can run */
export function requireTools(...vars: string[]): string {
  const tools = vars.map(v => `"$${v}"`).join(" ");
  return `for tool in ${tools}; do command -v "$tool" >/dev/null 2>&1 || { echo "cannot execute $tool" >&2; exit ${EXIT_COMMAND_NOT_FOUND}; }; done`;
}
