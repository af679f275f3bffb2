/**
 * Host adapters, one per HostKind. Adding a host means adding a variant
 * here; the builder never changes.
 */

import type { HostAdapter, HostKind, HostTools, ResolveRequest, Resolution } from "./types";
import { megaAdapter } from "./mega";
import { gofileAdapter } from "./gofile";
import { buzzheavierAdapter } from "./buzzheavier";

export const ADAPTERS: Record<HostKind, HostAdapter> = {
  mega: megaAdapter,
  gofile: gofileAdapter,
  buzzheavier: buzzheavierAdapter,
};

export function resolveLocator(
  kind: HostKind,
  locator: unknown,
  request: ResolveRequest,
  tools: HostTools
): Resolution {
  return ADAPTERS[kind].resolve(locator, request, tools);
}

export type { HostAdapter, HostKind, HostTools, ResolveRequest, Resolution, LocatorInput } from "./types";
export { HOST_KINDS, DEFAULT_HOST_TOOLS, isHostKind } from "./types";
export { parseMegaLink, megaUrl } from "./mega";
export type { MegaLink } from "./mega";
export { parseGofileId, GOFILE_WEBSITE_TOKEN } from "./gofile";
export { parseBuzzheavierId } from "./buzzheavier";
