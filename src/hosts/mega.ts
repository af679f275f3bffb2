/**
 * Mega adapter
 *
 * Downloads with megatools' `megadl`. File links and folder links are told
 * apart by the link itself; a folder link may point at one node inside the
 * folder (`.../folder/<id>#<key>/file/<node>`), which megadl fetches alone.
 *
 * megadl writes a folder link into a directory named after the folder. When
 * the download holds exactly one entry (dot-entries count) and it is a
 * directory, that directory becomes $out; otherwise the download directory
 * itself does. Digests of mega folders are taken over that result.
 */

import type { HostAdapter, HostTools, ResolveRequest, Resolution } from "./types";
import { readLocator, requireTools, script } from "./types";
import { UnsupportedLocatorShape } from "../core/errors";
import { EXIT_HOST_UNAVAILABLE, EXIT_NOT_FOUND } from "../core/types";

export interface MegaLink {
  type: "file" | "folder";
  id: string;
  key: string;
  /** Node selected inside a folder link */
  node?: { type: "file" | "folder"; id: string };
}

const SEGMENT = "[A-Za-z0-9_-]+";
const HOST = "https?://(?:www\\.)?mega\\.(?:nz|co\\.nz)";
const MODERN = new RegExp(
  `^${HOST}/(file|folder)/(${SEGMENT})#(${SEGMENT})(?:/(file|folder)/(${SEGMENT}))?/?$`
);
const LEGACY = new RegExp(`^${HOST}/#(F?)!(${SEGMENT})!(${SEGMENT})$`);

export function parseMegaLink(url: string): MegaLink | null {
  const modern = MODERN.exec(url);
  if (modern) {
    const [, type, id, key, nodeType, nodeId] = modern;
    if (type !== "file" && type !== "folder") return null;
    if (!nodeType || !nodeId) return { type, id, key };
    if (type === "file" || (nodeType !== "file" && nodeType !== "folder")) return null;
    return { type, id, key, node: { type: nodeType, id: nodeId } };
  }

  const legacy = LEGACY.exec(url);
  if (legacy) {
    const [, folder, id, key] = legacy;
    return { type: folder ? "folder" : "file", id, key };
  }

  return null;
}

export function megaUrl(link: MegaLink): string {
  const base = `https://mega.nz/${link.type}/${link.id}#${link.key}`;
  return link.node ? `${base}/${link.node.type}/${link.node.id}` : base;
}

const DOWNLOAD = [
  "set -eu",
  requireTools("MEGADL"),
  'dl="$TMPDIR/mega"',
  'mkdir -p "$dl"',
  'if ! "$MEGADL" --no-progress --path "$dl" "$MEGA_URL" 2>"$TMPDIR/megadl.log"; then',
  '  cat "$TMPDIR/megadl.log" >&2',
  `  if grep -qiE 'ENOENT|not found|does not exist' "$TMPDIR/megadl.log"; then exit ${EXIT_NOT_FOUND}; fi`,
  `  if grep -qiE 'EAGAIN|ETEMPUNAVAIL|EOVERQUOTA|timed out|connect' "$TMPDIR/megadl.log"; then exit ${EXIT_HOST_UNAVAILABLE}; fi`,
  "  exit 1",
  "fi",
  "set --",
  'for entry in "$dl"/* "$dl"/.[!.]* "$dl"/..?*; do',
  '  if [ -e "$entry" ] || [ -L "$entry" ]; then set -- "$@" "$entry"; fi',
  "done",
];

const TAKE_FILE = script([
  ...DOWNLOAD,
  'if [ "$#" -ne 1 ] || [ ! -f "$1" ]; then',
  '  echo "megadl did not produce exactly one file" >&2',
  "  exit 1",
  "fi",
  'mv "$1" "$out"',
]);

const TAKE_FOLDER = script([
  ...DOWNLOAD,
  'if [ "$#" -eq 1 ] && [ -d "$1" ]; then',
  '  mv "$1" "$out"',
  "else",
  '  mv "$dl" "$out"',
  "fi",
]);

export const megaAdapter: HostAdapter = {
  kind: "mega",

  resolve(locator: unknown, request: ResolveRequest, tools: HostTools): Resolution {
    const input = readLocator("mega", locator);
    if (!("url" in input)) {
      throw new UnsupportedLocatorShape(input.id, "mega locators are share links, not bare ids");
    }

    const link = parseMegaLink(input.url);
    if (!link) {
      throw new UnsupportedLocatorShape(input.url, "not a mega file or folder link");
    }

    const url = megaUrl(link);
    const isFile = link.node ? link.node.type === "file" : link.type === "file";

    return {
      locator: url,
      procedure: {
        builder: "/bin/sh",
        args: ["-c", isFile ? TAKE_FILE : TAKE_FOLDER],
        env: { MEGADL: tools.megadl, MEGA_URL: url },
        network: true,
      },
      shape: isFile ? "file" : "directory",
      // megadl selects by node id only, so paths are pruned locally
      prune: request.subPath,
    };
  },
};
