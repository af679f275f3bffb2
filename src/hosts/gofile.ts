/**
 * Gofile adapter
 *
 * Gofile content ids always name folders. The script creates a guest
 * account, lists the folder through the API with curl and jq, and downloads
 * every file, recursing into sub-folders.
 *
 * A single-segment sub-path ("notes.txt") is selected through the API, so
 * only that file is downloaded. Deeper paths, or a trailing slash asking
 * for a folder ("docs/"), fetch the whole folder and prune locally.
 */

import type { HostAdapter, HostTools, ResolveRequest, Resolution } from "./types";
import { readLocator, requireTools, script } from "./types";
import { UnsupportedLocatorShape } from "../core/errors";
import { EXIT_HOST_UNAVAILABLE, EXIT_NOT_FOUND } from "../core/types";
import { splitSubPath } from "../core/normalize";

/** Token the gofile web client sends with content requests */
export const GOFILE_WEBSITE_TOKEN = "4fd6sg89d7s6";

const ID = /^[A-Za-z0-9]+$/;
const URL_PATTERN = /^https?:\/\/(?:www\.)?gofile\.io\/d\/([A-Za-z0-9]+)\/?$/;

export function parseGofileId(input: { url: string } | { id: string }): string | null {
  if ("id" in input) {
    return ID.test(input.id) ? input.id : null;
  }
  return URL_PATTERN.exec(input.url)?.[1] ?? null;
}

const PRELUDE = [
  "set -eu",
  requireTools("CURL", "JQ"),
  "api=https://api.gofile.io",
  `token=$("$CURL" -fsS -X POST "$api/accounts" | "$JQ" -r '.data.token // empty') || exit ${EXIT_HOST_UNAVAILABLE}`,
  'if [ -z "$token" ]; then',
  '  echo "gofile: could not create a guest account" >&2',
  `  exit ${EXIT_HOST_UNAVAILABLE}`,
  "fi",
  "",
  "# list <content id>: children as type<TAB>id<TAB>name<TAB>link",
  "list() {",
  `  json=$("$CURL" -fsS -H "Authorization: Bearer $token" "$api/contents/$1?wt=$GOFILE_WT") || exit ${EXIT_HOST_UNAVAILABLE}`,
  `  status=$(printf '%s' "$json" | "$JQ" -r '.status')`,
  '  case "$status" in',
  "    ok) ;;",
  `    error-notFound) echo "gofile: $1 not found" >&2; exit ${EXIT_NOT_FOUND} ;;`,
  `    *) echo "gofile: api answered $status for $1" >&2; exit ${EXIT_HOST_UNAVAILABLE} ;;`,
  "  esac",
  `  printf '%s' "$json" | "$JQ" -r '(.data.children // {}) | (if type == "object" then [.[]] else . end) | sort_by(.name) | .[] | [.type, .id, .name, (.link // "")] | @tsv'`,
  "}",
  "",
  "# download <link> <dest>",
  "download() {",
  `  "$CURL" -fsSL -H "Cookie: accountToken=$token" -o "$2" "$1" || exit ${EXIT_HOST_UNAVAILABLE}`,
  "}",
  "",
  "# fetch_folder <content id> <dest dir>",
  "fetch_folder() {",
  '  mkdir -p "$2"',
  '  list "$1" > "$TMPDIR/ls-$1"',
  "  tab=$(printf '\\t')",
  '  while IFS="$tab" read -r ctype cid cname clink; do',
  '    case "$cname" in',
  '      ""|.|..|*/*) echo "gofile: refusing entry name \'$cname\'" >&2; exit 1 ;;',
  "    esac",
  '    case "$ctype" in',
  '      file) download "$clink" "$2/$cname" ;;',
  '      folder) fetch_folder "$cid" "$2/$cname" ;;',
  "    esac",
  '  done < "$TMPDIR/ls-$1"',
  "}",
  "",
];

const FETCH_FOLDER = script([...PRELUDE, 'fetch_folder "$GOFILE_ID" "$out"']);

const FETCH_ONE = script([
  ...PRELUDE,
  'list "$GOFILE_ID" > "$TMPDIR/ls-root"',
  `entry=$("$JQ" -Rr --arg name "$GOFILE_SELECT" 'split("\\t") | select(.[2] == $name) | [.[0], .[3]] | @tsv' < "$TMPDIR/ls-root" | head -n 1)`,
  'if [ -z "$entry" ]; then',
  '  echo "gofile: no entry named $GOFILE_SELECT in $GOFILE_ID" >&2',
  `  exit ${EXIT_NOT_FOUND}`,
  "fi",
  "tab=$(printf '\\t')",
  'ctype=${entry%%"$tab"*}',
  'clink=${entry#*"$tab"}',
  'if [ "$ctype" != file ]; then',
  '  echo "gofile: $GOFILE_SELECT is a folder; select it with a trailing slash" >&2',
  "  exit 1",
  "fi",
  'download "$clink" "$out"',
]);

export const gofileAdapter: HostAdapter = {
  kind: "gofile",

  resolve(locator: unknown, request: ResolveRequest, tools: HostTools): Resolution {
    const input = readLocator("gofile", locator);
    const id = parseGofileId(input);
    if (!id) {
      const shown = "url" in input ? input.url : input.id;
      throw new UnsupportedLocatorShape(shown, "not a gofile content id or https://gofile.io/d/<id> link");
    }

    const url = `https://gofile.io/d/${id}`;
    const env = { CURL: tools.curl, JQ: tools.jq, GOFILE_ID: id, GOFILE_WT: GOFILE_WEBSITE_TOKEN };

    const subPath = request.subPath;
    const segments = subPath === undefined ? [] : splitSubPath(subPath, url);
    const selectOne = subPath !== undefined && segments.length === 1 && !subPath.endsWith("/");

    if (selectOne) {
      return {
        locator: `${url}#${segments[0]}`,
        procedure: {
          builder: "/bin/sh",
          args: ["-c", FETCH_ONE],
          env: { ...env, GOFILE_SELECT: segments[0] },
          network: true,
        },
        shape: "file",
      };
    }

    return {
      locator: url,
      procedure: { builder: "/bin/sh", args: ["-c", FETCH_FOLDER], env, network: true },
      shape: "directory",
      prune: subPath,
    };
  },
};
