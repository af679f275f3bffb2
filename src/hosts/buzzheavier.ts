/**
 * Buzzheavier adapter
 *
 * Buzzheavier serves single files. Asking for `/<id>/download` as an htmx
 * request answers with an `hx-redirect` header naming the real download.
 */

import type { HostAdapter, HostTools, ResolveRequest, Resolution } from "./types";
import { readLocator, requireTools, script } from "./types";
import { UnsupportedLocatorShape } from "../core/errors";
import { EXIT_HOST_UNAVAILABLE, EXIT_NOT_FOUND } from "../core/types";

const ID = /^[A-Za-z0-9]+$/;
const URL_PATTERN = /^https?:\/\/(?:www\.)?buzzheavier\.com\/(?:f\/)?([A-Za-z0-9]+)(?:\/download)?\/?$/;

export function parseBuzzheavierId(input: { url: string } | { id: string }): string | null {
  if ("id" in input) {
    return ID.test(input.id) ? input.id : null;
  }
  return URL_PATTERN.exec(input.url)?.[1] ?? null;
}

const DOWNLOAD = script([
  "set -eu",
  requireTools("CURL"),
  "base=https://buzzheavier.com",
  'headers="$TMPDIR/headers"',
  `code=$("$CURL" -sS -o /dev/null -D "$headers" -w '%{http_code}' -H "HX-Request: true" -H "Referer: $base/$BUZZHEAVIER_ID" "$base/$BUZZHEAVIER_ID/download") || exit ${EXIT_HOST_UNAVAILABLE}`,
  `location=$(tr -d '\\r' < "$headers" | sed -n 's/^[Hh][Xx]-[Rr][Ee][Dd][Ii][Rr][Ee][Cc][Tt]: *//p' | head -n 1)`,
  'if [ -z "$location" ]; then',
  '  case "$code" in',
  `    404) echo "buzzheavier: $BUZZHEAVIER_ID not found" >&2; exit ${EXIT_NOT_FOUND} ;;`,
  `    *) echo "buzzheavier: no download link for $BUZZHEAVIER_ID (HTTP $code)" >&2; exit ${EXIT_HOST_UNAVAILABLE} ;;`,
  "  esac",
  "fi",
  'case "$location" in',
  '  /*) location="$base$location" ;;',
  "esac",
  `"$CURL" -fsSL -o "$out" "$location" || exit ${EXIT_HOST_UNAVAILABLE}`,
]);

export const buzzheavierAdapter: HostAdapter = {
  kind: "buzzheavier",

  resolve(locator: unknown, request: ResolveRequest, tools: HostTools): Resolution {
    const input = readLocator("buzzheavier", locator);
    const id = parseBuzzheavierId(input);
    if (!id) {
      const shown = "url" in input ? input.url : input.id;
      throw new UnsupportedLocatorShape(shown, "not a buzzheavier file id or https://buzzheavier.com/<id> link");
    }

    return {
      locator: `https://buzzheavier.com/${id}`,
      procedure: {
        builder: "/bin/sh",
        args: ["-c", DOWNLOAD],
        env: { CURL: tools.curl, BUZZHEAVIER_ID: id },
        network: true,
      },
      shape: "file",
      // Only meaningful inside an unpacked archive
      prune: request.subPath,
    };
  },
};
